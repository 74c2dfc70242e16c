import { describe, it, expect, afterEach } from 'vitest';
import net from 'node:net';
import { TcpPortProbe } from '../../src/probe/TcpPortProbe';

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Expected a TCP address'));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
  });
}

describe('TcpPortProbe', () => {
  const probe = new TcpPortProbe();
  let server: net.Server | undefined;

  afterEach(async () => {
    if (server?.listening) {
      await close(server);
    }
    server = undefined;
  });

  it('reports a listening port as reachable', async () => {
    server = net.createServer((socket) => socket.destroy());
    const port = await listen(server);

    const result = await probe.check('127.0.0.1', port, 1_000);

    expect(result.reachable).toBe(true);
    expect(result.host).toBe('127.0.0.1');
    expect(result.port).toBe(port);
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    expect(result.error).toBeUndefined();
  });

  it('reports a closed port as unreachable without rejecting', async () => {
    server = net.createServer();
    const port = await listen(server);
    await close(server);

    const result = await probe.check('127.0.0.1', port, 1_000);

    expect(result.reachable).toBe(false);
    expect(result.error).toContain('ECONNREFUSED');
  });
});
