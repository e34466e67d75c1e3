import http from 'node:http';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { AppResponse, Application } from '@/core/adapter.js';
import { createApplicationAdapter } from '@/core/adapter.js';
import type { Dispatcher, DispatcherOptions } from '@/core/dispatcher.js';
import { createDispatcher } from '@/core/dispatcher.js';

import { closeServer, listenEphemeral, sleep, waitFor } from '../helpers/test-utils.js';

interface Latch {
  promise: Promise<void>;
  release: () => void;
}

function createLatch(): Latch {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });

  return { promise, release };
}

describe('dispatcher', () => {
  const servers: http.Server[] = [];

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    for (const server of servers.splice(0)) {
      await closeServer(server);
    }

    vi.restoreAllMocks();
  });

  async function startDispatcher(
    app: Application,
    options: Partial<DispatcherOptions> = {},
  ): Promise<{ dispatcher: Dispatcher; baseUrl: string }> {
    const dispatcher = createDispatcher(createApplicationAdapter(app), {
      concurrency: 1,
      backlog: 4,
      requestTimeoutMs: 5000,
      ...options,
    });

    const server = http.createServer((req, res) => {
      void dispatcher.dispatch(req, res);
    });
    servers.push(server);

    const { baseUrl } = await listenEphemeral(server);
    return { dispatcher, baseUrl };
  }

  it('queues work beyond the concurrency limit instead of rejecting it', async () => {
    let active = 0;
    let maxActive = 0;

    const { dispatcher, baseUrl } = await startDispatcher({
      async handle(request) {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await sleep(50);
        active -= 1;
        return { body: request.path };
      },
    });

    const responses = await Promise.all(['/a', '/b', '/c'].map((target) => fetch(`${baseUrl}${target}`)));

    expect(responses.map((response) => response.status)).toEqual([200, 200, 200]);
    expect(await Promise.all(responses.map((response) => response.text()))).toEqual(['/a', '/b', '/c']);
    expect(maxActive).toBe(1);

    await waitFor(() => dispatcher.getSnapshot().units[0].handled === 3);
    expect(dispatcher.getSnapshot().units[0]).toMatchObject({ state: 'idle', handled: 3, failed: 0 });
  });

  it('answers 503 once the queue is full', async () => {
    const latch = createLatch();
    const { dispatcher, baseUrl } = await startDispatcher(
      {
        async handle() {
          await latch.promise;
          return { body: 'done' };
        },
      },
      { backlog: 1 },
    );

    const first = fetch(`${baseUrl}/first`);
    await waitFor(() => dispatcher.getSnapshot().active === 1);

    const second = fetch(`${baseUrl}/second`);
    await waitFor(() => dispatcher.getSnapshot().queued === 1);

    const rejected = await fetch(`${baseUrl}/third`);
    expect(rejected.status).toBe(503);
    expect(rejected.headers.get('connection')).toBe('close');
    expect(await rejected.json()).toEqual({ message: 'Server overloaded' });

    latch.release();
    expect((await first).status).toBe(200);
    expect((await second).status).toBe(200);
    expect(dispatcher.getSnapshot().rejected).toBe(1);
  });

  it('frees the unit when a request times out', async () => {
    const { dispatcher, baseUrl } = await startDispatcher(
      {
        async handle() {
          await sleep(300);
          return { body: 'late' };
        },
      },
      { requestTimeoutMs: 50 },
    );

    const response = await fetch(`${baseUrl}/slow`);

    expect(response.status).toBe(504);
    await waitFor(() => dispatcher.getSnapshot().active === 0);

    const snapshot = dispatcher.getSnapshot();
    expect(snapshot.timedOut).toBe(1);
    expect(snapshot.units[0]).toMatchObject({ state: 'idle', failed: 1 });
  });

  it('drops a queued request whose client went away', async () => {
    const latch = createLatch();
    let calls = 0;

    const { dispatcher, baseUrl } = await startDispatcher({
      async handle() {
        calls += 1;
        await latch.promise;
        return { body: 'done' };
      },
    });

    const first = fetch(`${baseUrl}/first`);
    await waitFor(() => dispatcher.getSnapshot().active === 1);

    const controller = new AbortController();
    const abandoned = fetch(`${baseUrl}/abandoned`, { signal: controller.signal });
    await waitFor(() => dispatcher.getSnapshot().queued === 1);

    controller.abort();
    await expect(abandoned).rejects.toThrow();
    await waitFor(() => dispatcher.getSnapshot().queued === 0);

    latch.release();
    expect((await first).status).toBe(200);
    expect(calls).toBe(1);
  });

  it('lets in-flight work finish during a drain and turns new work away', async () => {
    const latch = createLatch();
    const { dispatcher, baseUrl } = await startDispatcher({
      async handle() {
        await latch.promise;
        return { body: 'finished' };
      },
    });

    const inflight = fetch(`${baseUrl}/work`);
    await waitFor(() => dispatcher.getSnapshot().active === 1);

    const drained = dispatcher.drain(5000);
    expect(dispatcher.isDraining()).toBe(true);

    const refused = await fetch(`${baseUrl}/late`);
    expect(refused.status).toBe(503);
    expect(await refused.json()).toEqual({ message: 'Server is shutting down' });

    latch.release();
    const response = await inflight;
    expect(await response.text()).toBe('finished');

    const report = await drained;
    expect(report.completed).toBe(1);
    expect(report.forced).toBe(0);
  });

  it('cuts off what is left when the grace period expires', async () => {
    const { dispatcher, baseUrl } = await startDispatcher({
      handle: () => new Promise<AppResponse>(() => {}),
    });

    const stuck = fetch(`${baseUrl}/stuck`);
    await waitFor(() => dispatcher.getSnapshot().active === 1);

    const queued = fetch(`${baseUrl}/queued`);
    await waitFor(() => dispatcher.getSnapshot().queued === 1);

    const report = await dispatcher.drain(50);

    expect(report).toMatchObject({ completed: 0, forced: 2 });
    await expect(stuck).rejects.toThrow();
    expect((await queued).status).toBe(503);
    expect(dispatcher.getSnapshot()).toMatchObject({ active: 0, queued: 0, draining: true });
  });
});
