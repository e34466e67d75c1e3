import http from 'node:http';
import net from 'node:net';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AddressInUseError, ListenerError, PermissionError } from '@/common/errors.js';
import { classifyBindError, listenShared, probeListener } from '@/core/listener.js';

import { closeServer, listenEphemeral } from '../helpers/test-utils.js';

function errnoError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('listener', () => {
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

  it('fails the probe on a port that is taken', async () => {
    const occupant = http.createServer();
    servers.push(occupant);
    const { port } = await listenEphemeral(occupant);

    const probing = probeListener({ host: '127.0.0.1', port, backlog: 16 });

    await expect(probing).rejects.toBeInstanceOf(AddressInUseError);
    await expect(probing).rejects.toThrow(`Address already in use: 127.0.0.1:${port}`);
  });

  it('releases the address after a successful probe', async () => {
    const scratch = http.createServer();
    const { port } = await listenEphemeral(scratch);
    await closeServer(scratch);

    await probeListener({ host: '127.0.0.1', port, backlog: 16 });

    const server = http.createServer();
    servers.push(server);
    const address = await listenShared(server, { host: '127.0.0.1', port, backlog: 16 });
    expect(address.port).toBe(port);
  });

  it('classifies bind errors', () => {
    const inUse = classifyBindError(errnoError('listen EADDRINUSE', 'EADDRINUSE'), '::1', 8080);
    expect(inUse).toBeInstanceOf(AddressInUseError);
    expect(inUse.message).toBe('Address already in use: [::1]:8080');

    const denied = classifyBindError(errnoError('listen EACCES', 'EACCES'), '0.0.0.0', 80);
    expect(denied).toBeInstanceOf(PermissionError);
    expect(denied.code).toBe('PERMISSION_DENIED');

    const other = classifyBindError(errnoError('weird', 'EWEIRD'), '127.0.0.1', 80);
    expect(other).toBeInstanceOf(ListenerError);
    expect(other.code).toBe('LISTEN_FAILED');
    expect(other.message).toBe('Cannot listen on 127.0.0.1:80: weird');
  });

  it('rejects listenShared with a classified error', async () => {
    const occupant = net.createServer();
    const taken = await listenShared(occupant, { host: '127.0.0.1', port: 0, backlog: 16 });

    try {
      const server = http.createServer();
      await expect(listenShared(server, { host: '127.0.0.1', port: taken.port, backlog: 16 })).rejects.toBeInstanceOf(
        AddressInUseError,
      );
    } finally {
      await new Promise<void>((resolve) => occupant.close(() => resolve()));
    }
  });
});
