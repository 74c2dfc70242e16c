import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import type { ArgumentsCamelCase } from 'yargs';

const { execFileMock, portCheck } = vi.hoisted(() => ({
  execFileMock: vi.fn(),
  portCheck: vi.fn(),
}));

vi.mock('node:child_process', () => ({
  execFile: execFileMock,
}));

vi.mock('global-logger-factory', () => ({
  getLoggerFor: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
  setGlobalLoggerFactory: vi.fn(),
}));

vi.mock('../../src/logging/ConfigurableLoggerFactory', () => ({
  ConfigurableLoggerFactory: class {},
}));

vi.mock('../../src/probe/TcpPortProbe', () => ({
  TcpPortProbe: class {
    public check = portCheck;
  },
}));

import { checkCommand } from '../../src/cli/commands/check';
import { installCommand } from '../../src/cli/commands/install';
import { monitorCommand } from '../../src/cli/commands/monitor';
import { startCommand, toFailure } from '../../src/cli/commands/start';
import { statusCommand } from '../../src/cli/commands/status';
import type { ServiceArgs } from '../../src/cli/options';
import type { PortCheckResult } from '../../src/probe/TcpPortProbe';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

interface Reply {
  error?: Error;
  stdout?: string;
  stderr?: string;
}

interface HostState {
  exists: boolean;
  running: boolean;
  runError?: string;
  /** Port reachability; follows `running` when unset. */
  portPinned?: boolean;
  reloadError?: string;
}

/** In-process stand-in for the docker daemon and systemd. */
const host: HostState = { exists: false, running: false };

function failed(stderr: string): Reply {
  return { error: Object.assign(new Error('Command failed'), { code: 1 }), stderr };
}

function docker(args: string[]): Reply {
  switch (args[0]) {
    case 'inspect':
      if (!host.exists) {
        return failed('Error: No such container: svc');
      }
      if (args.includes('{{json .State.Health}}')) {
        return { stdout: 'null\n' };
      }
      return { stdout: JSON.stringify({ Status: host.running ? 'running' : 'exited', Running: host.running }) };
    case 'run':
      if (host.runError) {
        return failed(host.runError);
      }
      host.exists = true;
      host.running = true;
      return { stdout: 'c0ffee\n' };
    case 'stop':
      host.running = false;
      return {};
    case 'rm':
      host.exists = false;
      return {};
    case 'logs':
      return { stdout: 'listening on 3000\n' };
    default:
      return failed(`unknown command ${args[0]}`);
  }
}

function systemctl(args: string[]): Reply {
  if (args[0] === 'daemon-reload' && host.reloadError) {
    return failed(host.reloadError);
  }
  return args[0] === 'is-active' ? { stdout: 'active\n' } : {};
}

describe('CLI commands', () => {
  let tmpDir: string;

  function serviceArgs(): ArgumentsCamelCase<ServiceArgs> {
    return {
      _: [],
      $0: 'service-watchdog',
      name: 'svc',
      wall: false,
      'ready-attempts': 2,
      'poll-interval': 1,
      'check-interval': 1,
      'check-timeout': 100,
      'log-file': path.join(tmpDir, 'svc-watchdog.log'),
    };
  }

  function printed(): unknown[] {
    return vi.mocked(console.log).mock.calls.map((call: unknown[]) => call[0]);
  }

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'watchdog-cli-'));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    Object.assign(host, { exists: false, running: false, runError: undefined, portPinned: undefined, reloadError: undefined });
    execFileMock.mockReset();
    execFileMock.mockImplementation((file: string, args: string[], _options: unknown, callback: ExecCallback) => {
      const reply = file === 'docker' ? docker(args) : systemctl(args);
      callback(reply.error ?? null, reply.stdout ?? '', reply.stderr ?? '');
    });
    portCheck.mockReset();
    portCheck.mockImplementation(async (portHost: string, port: number): Promise<PortCheckResult> => {
      const reachable = host.portPinned ?? host.running;
      return reachable
        ? { host: portHost, port, reachable, latencyMs: 1 }
        : { host: portHost, port, reachable, error: `connect ECONNREFUSED 127.0.0.1:${port}` };
    });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  describe('check', () => {
    it('exits 0 when the service is healthy', async () => {
      host.exists = true;
      host.running = true;

      await checkCommand.handler({ ...serviceArgs(), json: false });

      expect(printed()).toEqual([ 'svc: healthy' ]);
      expect(process.exitCode).toBe(0);
    });

    it('exits 1 and lists the failed sub-checks when the service is down', async () => {
      await checkCommand.handler({ ...serviceArgs(), json: false });

      expect(printed()).toEqual([ 'svc: down', '  - port localhost:3000: connect ECONNREFUSED 127.0.0.1:3000' ]);
      expect(process.exitCode).toBe(1);
    });

    it('prints the signal as JSON', async () => {
      host.exists = true;
      host.running = true;
      host.portPinned = false;

      await checkCommand.handler({ ...serviceArgs(), json: true });

      expect(JSON.parse(String(printed()[0]))).toEqual({
        service: 'svc',
        status: 'degraded',
        signal: { containerRunning: true, portReachable: false, runtimeHealth: 'healthy' },
      });
      expect(process.exitCode).toBe(1);
    });

    it('exits 1 on invalid configuration', async () => {
      await checkCommand.handler({ ...serviceArgs(), name: '-bad', json: false });

      expect(console.error).toHaveBeenCalledWith('check failed: Invalid container name: "-bad"');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('status', () => {
    it('exits 0 for a service that is down', async () => {
      await statusCommand.handler({ ...serviceArgs(), json: false, lines: 10 });

      const [ table ] = printed();
      expect(String(table).split('\n').slice(0, 2)).toEqual([ '=== svc status ===', '○ down' ]);
      expect(process.exitCode).toBe(0);
    });

    it('reports the container logs as JSON', async () => {
      host.exists = true;
      host.running = true;

      await statusCommand.handler({ ...serviceArgs(), json: true, lines: 5 });

      const report = JSON.parse(String(printed()[0]));
      expect(report.status).toBe('healthy');
      expect(report.diagnostics.containerLogs).toEqual([ 'listening on 3000' ]);
      expect(process.exitCode).toBe(0);
    });

    it('still exits 0 when the configuration is invalid', async () => {
      await statusCommand.handler({ ...serviceArgs(), name: '-bad', json: false, lines: 10 });

      expect(console.error).toHaveBeenCalledWith('status unavailable: Invalid container name: "-bad"');
      expect(process.exitCode).toBe(0);
    });
  });

  describe('start', () => {
    it('exits 0 once the recreated service is ready', async () => {
      host.exists = true;

      await startCommand.handler(serviceArgs());

      expect(printed()).toEqual([ 'svc is ready (1 readiness check(s))' ]);
      expect(process.exitCode).toBe(0);
    });

    it('exits 1 when the container cannot be started', async () => {
      host.runError = 'could not select device driver "nvidia"';

      await startCommand.handler(serviceArgs());

      expect(console.error).toHaveBeenCalledWith('Recreating svc failed: could not select device driver "nvidia"');
      expect(process.exitCode).toBe(1);
    });

    it('exits 1 when readiness runs out', async () => {
      host.portPinned = false;

      await startCommand.handler(serviceArgs());

      expect(console.error).toHaveBeenCalledWith('svc did not become ready after 2 readiness checks');
      expect(process.exitCode).toBe(1);
    });

    it('treats an interrupted recovery as a failure', () => {
      const failure = toFailure({
        service: 'svc',
        startedAt: '2026-01-01T00:00:00.000Z',
        finishedAt: '2026-01-01T00:00:01.000Z',
        outcome: 'cancelled',
        attemptsConsumed: 1,
      });

      expect(failure?.message).toBe('Recreating svc failed: cancelled');
    });
  });

  describe('install', () => {
    function installArgs() {
      const unitDir = path.join(tmpDir, 'units');
      return { ...serviceArgs(), 'unit-dir': unitDir, unitDir, 'systemctl-bin': 'systemctl', systemctlBin: 'systemctl' };
    }

    it('writes and activates the unit', async () => {
      const argv = installArgs();

      await installCommand.handler(argv);

      const unitPath = path.join(argv.unitDir, 'svc-watchdog.service');
      expect(printed()[0]).toBe(`Installed ${unitPath}`);
      await expect(fs.readFile(unitPath, 'utf-8')).resolves.toContain('Restart=always');
      expect(process.exitCode).toBe(0);
    });

    it('exits 1 and asks for root when systemd refuses', async () => {
      host.reloadError = 'Access denied';

      await installCommand.handler(installArgs());

      expect(console.error).toHaveBeenCalledWith('Run: sudo service-watchdog install');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('monitor', () => {
    it('exits 1 when setup fails', async () => {
      await monitorCommand.handler({ ...serviceArgs(), name: '-bad' });

      expect(console.error).toHaveBeenCalledWith('monitor failed: Invalid container name: "-bad"');
      expect(process.exitCode).toBe(1);
    });

    it('exits 0 after SIGINT and releases its signal handlers', async () => {
      host.exists = true;
      host.running = true;
      const before = process.listeners('SIGINT');

      const running = monitorCommand.handler(serviceArgs());
      const shutdown = await vi.waitFor(() => {
        const added = process.listeners('SIGINT').find((listener) => !before.includes(listener));
        if (!added) {
          throw new Error('no SIGINT handler yet');
        }
        return added;
      });
      shutdown('SIGINT');
      await running;

      expect(process.exitCode).toBe(0);
      expect(process.listeners('SIGINT')).toEqual(before);
      expect(console.error).not.toHaveBeenCalled();
    });
  });
});
