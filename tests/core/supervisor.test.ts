import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';

import { ExitCode } from '@/common/consts.js';
import { AddressInUseError, RestartCapExceededError, WorkerBootError } from '@/common/errors.js';
import type { ConfigInput } from '@/core/config.js';
import type { ListenTarget } from '@/core/listener.js';
import type { Supervisor } from '@/core/supervisor.js';
import { createSupervisor } from '@/core/supervisor.js';

import { FakeLauncher, flushMicrotasks } from '../helpers/fake-launcher.js';
import { createTestConfig } from '../helpers/test-utils.js';

interface Harness {
  supervisor: Supervisor;
  launcher: FakeLauncher;
  probe: Mock<(target: ListenTarget) => Promise<void>>;
}

function createHarness(overrides: ConfigInput = {}): Harness {
  const launcher = new FakeLauncher();
  const probe = vi.fn<(target: ListenTarget) => Promise<void>>(async () => {});
  const supervisor = createSupervisor(
    createTestConfig({
      port: 8123,
      workers: 2,
      gracefulTimeoutMs: 1000,
      restartBackoffMs: 500,
      maxRestartBackoffMs: 4000,
      ...overrides,
    }),
    { launcher, probe },
  );

  return { supervisor, launcher, probe };
}

describe('supervisor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('probes the address and resolves once every worker is ready', async () => {
    const { supervisor, launcher, probe } = createHarness({ workers: 3 });

    await supervisor.start();

    expect(probe).toHaveBeenCalledWith({ host: '127.0.0.1', port: 8123, backlog: 2048 });
    expect(launcher.prepared).toBe(1);
    expect(launcher.launched.map((worker) => worker.slot)).toEqual([0, 1, 2]);

    const snapshot = supervisor.getSnapshot();
    expect(snapshot.state).toBe('running');
    expect(snapshot.workers.map((worker) => [worker.slot, worker.state, worker.restartCount])).toEqual([
      [0, 'ready', 0],
      [1, 'ready', 0],
      [2, 'ready', 0],
    ]);
  });

  it('skips the probe for an ephemeral port', async () => {
    const { supervisor, probe } = createHarness({ port: 0 });

    await supervisor.start();

    expect(probe).not.toHaveBeenCalled();
  });

  it('replaces a crashed worker after the backoff', async () => {
    const { supervisor, launcher } = createHarness();
    await supervisor.start();

    launcher.launched[0].exit(1);

    expect(supervisor.getSnapshot().pendingRestarts).toEqual([0]);
    expect(supervisor.getSnapshot().workers).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(499);
    expect(launcher.launched).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(1);
    await flushMicrotasks();

    expect(launcher.launched).toHaveLength(3);
    expect(launcher.launched[2].slot).toBe(0);

    const snapshot = supervisor.getSnapshot();
    expect(snapshot.workers.map((worker) => [worker.slot, worker.state, worker.restartCount])).toEqual([
      [0, 'ready', 1],
      [1, 'ready', 0],
    ]);
    expect(snapshot.totalRestarts).toBe(1);
    expect(snapshot.pendingRestarts).toEqual([]);
  });

  it('backs off exponentially for repeated crashes', async () => {
    const { supervisor, launcher } = createHarness();
    await supervisor.start();

    launcher.launched[0].exit(1);
    await vi.advanceTimersByTimeAsync(500);
    await flushMicrotasks();

    launcher.launched[2].exit(1);
    await vi.advanceTimersByTimeAsync(999);
    expect(launcher.launched).toHaveLength(3);

    await vi.advanceTimersByTimeAsync(1);
    expect(launcher.launched).toHaveLength(4);
    expect(supervisor.getSnapshot().recentRestarts).toBe(2);
  });

  it('gives up once the restart cap is exceeded', async () => {
    const { supervisor, launcher } = createHarness({ maxRestarts: 1 });
    await supervisor.start();

    launcher.launched[0].exit(1);
    await vi.advanceTimersByTimeAsync(500);
    await flushMicrotasks();

    launcher.launched[2].exit(1, 'SIGSEGV');
    const exit = await supervisor.wait();

    expect(exit.code).toBe(ExitCode.RestartCapExceeded);
    expect(exit.reason).toBe('restart_cap_exceeded');
    expect(exit.error).toBeInstanceOf(RestartCapExceededError);
    expect(launcher.launched[1].sent).toEqual([{ type: 'shutdown', graceMs: 1000 }]);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(launcher.launched).toHaveLength(3);
  });

  it('drains every worker on stop', async () => {
    const { supervisor, launcher } = createHarness();
    await supervisor.start();

    const stopping = supervisor.stop('SIGTERM');
    expect(supervisor.stop('SIGINT')).toBe(stopping);

    const exit = await stopping;

    expect(exit).toEqual({ code: ExitCode.Ok, reason: 'SIGTERM' });
    for (const worker of launcher.launched) {
      expect(worker.sent).toEqual([{ type: 'shutdown', graceMs: 1000 }]);
      expect(worker.signals).toEqual([]);
    }
    expect(supervisor.getSnapshot().state).toBe('stopped');
  });

  it('does not restart workers that exit during a stop', async () => {
    const { supervisor, launcher } = createHarness();
    await supervisor.start();

    for (const worker of launcher.launched) {
      worker.exitOnShutdown = false;
    }

    const stopping = supervisor.stop();
    launcher.launched[0].exit(1);
    launcher.launched[1].exit(0);

    await expect(stopping).resolves.toEqual({ code: ExitCode.Ok, reason: 'shutdown_requested' });
    await vi.advanceTimersByTimeAsync(10_000);
    expect(launcher.launched).toHaveLength(2);
  });

  it('kills workers that outlive the grace period', async () => {
    const { supervisor, launcher } = createHarness();
    await supervisor.start();

    const stubborn = launcher.launched[1];
    stubborn.exitOnShutdown = false;

    const stopping = supervisor.stop();
    await flushMicrotasks();
    expect(supervisor.getSnapshot().workers.map((worker) => worker.slot)).toEqual([1]);

    await vi.advanceTimersByTimeAsync(2999);
    expect(stubborn.signals).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(stubborn.signals).toEqual(['SIGKILL']);

    await expect(stopping).resolves.toMatchObject({ code: ExitCode.Ok });
  });

  it('force-stops on demand with its own exit code', async () => {
    const { supervisor, launcher } = createHarness();
    await supervisor.start();

    for (const worker of launcher.launched) {
      worker.exitOnShutdown = false;
    }

    void supervisor.stop('SIGTERM');
    supervisor.forceStop('SIGTERM');

    const exit = await supervisor.wait();
    expect(exit).toEqual({ code: ExitCode.ForcedShutdown, reason: 'SIGTERM' });
    expect(launcher.launched.map((worker) => worker.signals)).toEqual([['SIGKILL'], ['SIGKILL']]);
  });

  it('fails startup when a worker cannot load the application', async () => {
    const { supervisor, launcher } = createHarness();
    launcher.onLaunch = (worker) => {
      if (worker.slot === 0) {
        worker.emit({ type: 'boot_failed', stage: 'load', error: { name: 'ApplicationLoadError', message: 'boom' } });
        worker.exit(1);
        return;
      }

      worker.ready();
    };

    const starting = supervisor.start();

    await expect(starting).rejects.toBeInstanceOf(WorkerBootError);
    await expect(starting).rejects.toThrow('Worker 0 failed to load the application: boom');

    const exit = await supervisor.wait();
    expect(exit.code).toBe(ExitCode.StartupFailure);
    expect(exit.reason).toBe('startup_failed');
    expect(launcher.launched[1].sent).toEqual([{ type: 'shutdown', graceMs: 1000 }]);
  });

  it('fails startup when a worker dies before it is ready', async () => {
    const { supervisor, launcher } = createHarness({ workers: 1 });
    launcher.onLaunch = (worker) => worker.exit(7);

    await expect(supervisor.start()).rejects.toThrow('Worker 0 exited (code 7) before it was ready');
    await expect(supervisor.wait()).resolves.toMatchObject({ code: ExitCode.StartupFailure });
  });

  it('fails startup without forking when the probe fails', async () => {
    const { supervisor, launcher, probe } = createHarness();
    probe.mockRejectedValueOnce(new AddressInUseError('127.0.0.1', 8123));

    await expect(supervisor.start()).rejects.toThrow('Address already in use: 127.0.0.1:8123');

    expect(launcher.prepared).toBe(0);
    expect(launcher.launched).toEqual([]);
    await expect(supervisor.wait()).resolves.toMatchObject({ code: ExitCode.StartupFailure });
  });

  it('stops cleanly when asked to stop during startup', async () => {
    const { supervisor, launcher } = createHarness();
    launcher.onLaunch = () => {};

    const starting = supervisor.start();
    await flushMicrotasks();
    expect(launcher.launched).toHaveLength(2);

    const exit = await supervisor.stop();

    await expect(starting).resolves.toBeUndefined();
    expect(exit).toEqual({ code: ExitCode.Ok, reason: 'shutdown_requested' });
  });

  it('spawns nothing when stopped while probing', async () => {
    const { supervisor, launcher, probe } = createHarness();
    let finishProbe: () => void = () => {};
    probe.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          finishProbe = resolve;
        }),
    );

    const starting = supervisor.start();
    await expect(supervisor.stop()).resolves.toMatchObject({ code: ExitCode.Ok });

    finishProbe();
    await starting;

    expect(launcher.prepared).toBe(0);
    expect(launcher.launched).toEqual([]);
  });
});
