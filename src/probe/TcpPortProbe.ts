import { Socket } from 'node:net';

export interface PortCheckResult {
  host: string;
  port: number;
  reachable: boolean;
  latencyMs?: number;
  error?: string;
}

export interface PortProbe {
  check(host: string, port: number, timeoutMs: number): Promise<PortCheckResult>;
}

/**
 * Reachability by plain TCP connect. Resolves, never rejects.
 */
export class TcpPortProbe implements PortProbe {
  public check(host: string, port: number, timeoutMs: number): Promise<PortCheckResult> {
    return new Promise((resolve) => {
      const startTime = Date.now();
      const socket = new Socket();
      let settled = false;

      const finish = (result: Omit<PortCheckResult, 'host' | 'port'>): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        socket.destroy();
        resolve({ host, port, ...result });
      };

      const timeout = setTimeout(() => {
        finish({ reachable: false, error: `Connection timeout after ${timeoutMs}ms` });
      }, timeoutMs);

      socket.once('connect', () => {
        finish({ reachable: true, latencyMs: Date.now() - startTime });
      });

      socket.once('error', (error) => {
        finish({ reachable: false, error: error.message });
      });

      try {
        socket.connect(port, host);
      } catch (error: unknown) {
        finish({
          reachable: false,
          error: error instanceof Error ? error.message : 'Unknown connection error',
        });
      }
    });
  }
}
