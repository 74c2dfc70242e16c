import { describe, it, expect, vi, beforeEach } from 'vitest';

const execFileMock = vi.hoisted(() => vi.fn());

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
}));

import { buildRunArgs, DockerCliRuntime } from '../../src/runtime/DockerCliRuntime';
import { ContainerRuntimeError, RuntimeUnavailableError } from '../../src/errors';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

interface FakeResult {
  error?: Error;
  stdout?: string;
  stderr?: string;
}

function respond(handler: (args: string[]) => FakeResult): void {
  execFileMock.mockImplementation((_file: string, args: string[], _options: unknown, callback: ExecCallback) => {
    const result = handler(args);
    callback(result.error ?? null, result.stdout ?? '', result.stderr ?? '');
  });
}

function failure(stderr: string): FakeResult {
  return { error: Object.assign(new Error('Command failed'), { code: 1 }), stderr };
}

describe('DockerCliRuntime', () => {
  let runtime: DockerCliRuntime;

  beforeEach(() => {
    execFileMock.mockReset();
    runtime = new DockerCliRuntime({ binary: 'docker', inspectTimeoutMs: 1_000, commandTimeoutMs: 2_000 });
  });

  describe('inspect', () => {
    it('parses the container state', async () => {
      respond(() => ({
        stdout: '{"Status":"running","Running":true,"StartedAt":"2026-01-01T00:00:00Z","ExitCode":0}\n',
      }));

      const state = await runtime.inspect('sp1-gpu');

      expect(state).toEqual({
        name: 'sp1-gpu',
        status: 'running',
        running: true,
        startedAt: '2026-01-01T00:00:00Z',
        exitCode: 0,
      });
      expect(execFileMock).toHaveBeenCalledWith(
        'docker',
        [ 'inspect', '--type', 'container', '--format', '{{json .State}}', 'sp1-gpu' ],
        expect.objectContaining({ timeout: 1_000 }),
        expect.any(Function),
      );
    });

    it('returns undefined for a missing container', async () => {
      respond(() => failure('Error: No such container: sp1-gpu'));

      await expect(runtime.inspect('sp1-gpu')).resolves.toBeUndefined();
    });

    it('reports a missing binary as RuntimeUnavailableError', async () => {
      respond(() => ({ error: Object.assign(new Error('spawn docker ENOENT'), { code: 'ENOENT' }) }));

      await expect(runtime.inspect('sp1-gpu')).rejects.toThrow(RuntimeUnavailableError);
      await expect(runtime.inspect('sp1-gpu')).rejects.toThrow('Container runtime binary "docker" not found');
    });

    it('reports an unreachable daemon as RuntimeUnavailableError', async () => {
      respond(() => failure('Cannot connect to the Docker daemon at unix:///var/run/docker.sock. Is the docker daemon running?'));

      await expect(runtime.inspect('sp1-gpu')).rejects.toThrow(RuntimeUnavailableError);
    });

    it('reports a killed command as a timeout', async () => {
      respond(() => ({ error: Object.assign(new Error('killed'), { killed: true }) }));

      await expect(runtime.inspect('sp1-gpu')).rejects.toThrow('docker inspect timed out after 1000ms');
    });
  });

  describe('health', () => {
    it.each([
      [ '{"Status":"healthy","FailingStreak":0}', 'healthy' ],
      [ '{"Status":"unhealthy"}', 'unhealthy' ],
      [ '{"Status":"starting"}', 'starting' ],
      [ 'null', 'none' ],
      [ '', 'none' ],
    ])('maps %s to %s', async (stdout, expected) => {
      respond(() => ({ stdout }));

      await expect(runtime.health('sp1-gpu')).resolves.toBe(expected);
    });
  });

  describe('run', () => {
    it('passes name, restart policy, ports, flags and image', async () => {
      respond(() => ({ stdout: 'abc123\n' }));

      await runtime.run({
        name: 'sp1-gpu',
        image: 'example/prover:v1',
        ports: [ { hostPort: 3000, containerPort: 3000 } ],
        restartPolicy: 'unless-stopped',
        flags: [ '--gpus', 'all' ],
      });

      expect(execFileMock).toHaveBeenCalledWith(
        'docker',
        [ 'run', '-d', '--name', 'sp1-gpu', '--restart', 'unless-stopped', '-p', '3000:3000', '--gpus', 'all', 'example/prover:v1' ],
        expect.objectContaining({ timeout: 2_000 }),
        expect.any(Function),
      );
    });

    it('allows a slow image pull by default', async () => {
      respond(() => ({ stdout: 'abc123\n' }));

      await new DockerCliRuntime().run({ name: 'svc', image: 'img', ports: [], restartPolicy: 'no', flags: [] });

      expect(execFileMock).toHaveBeenCalledWith(
        'docker',
        [ 'run', '-d', '--name', 'svc', '--restart', 'no', 'img' ],
        expect.objectContaining({ timeout: 900_000 }),
        expect.any(Function),
      );
    });

    it('surfaces the stderr of a failed run', async () => {
      respond(() => failure('docker: Error response from daemon: could not select device driver "" with capabilities: [[gpu]].\n'));

      const error = await runtime.run({
        name: 'sp1-gpu',
        image: 'example/prover:v1',
        ports: [],
        restartPolicy: 'no',
        flags: [],
      }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ContainerRuntimeError);
      expect(error).toMatchObject({
        command: 'run',
        message: 'docker: Error response from daemon: could not select device driver "" with capabilities: [[gpu]].',
      });
    });
  });

  describe('stop and remove', () => {
    it('ignore a missing container', async () => {
      respond(() => failure('Error response from daemon: No such container: sp1-gpu'));

      await expect(runtime.stop('sp1-gpu')).resolves.toBeUndefined();
      await expect(runtime.remove('sp1-gpu')).resolves.toBeUndefined();
    });

    it('propagate other failures', async () => {
      respond(() => failure('Error response from daemon: removal of container sp1-gpu is already in progress'));

      await expect(runtime.remove('sp1-gpu')).rejects.toThrow(ContainerRuntimeError);
    });
  });

  describe('logs', () => {
    it('merges stdout and stderr into non-empty lines', async () => {
      respond(() => ({ stdout: 'line one\n\nline two\n', stderr: 'warn three\n' }));

      await expect(runtime.logs('sp1-gpu', 20)).resolves.toEqual([ 'line one', 'line two', 'warn three' ]);
      expect(execFileMock.mock.calls[0][1]).toEqual([ 'logs', '--tail', '20', 'sp1-gpu' ]);
    });

    it('returns at most the requested number of lines across both streams', async () => {
      respond(() => ({ stdout: 'out 1\nout 2\nout 3\n', stderr: 'err 1\nerr 2\nerr 3\n' }));

      await expect(runtime.logs('sp1-gpu', 3)).resolves.toEqual([ 'err 1', 'err 2', 'err 3' ]);
    });

    it('returns no lines for a missing container', async () => {
      respond(() => failure('Error: No such container: sp1-gpu'));

      await expect(runtime.logs('sp1-gpu', 20)).resolves.toEqual([]);
    });
  });
});

describe('buildRunArgs', () => {
  it('emits one -p per mapping', () => {
    expect(buildRunArgs({
      name: 'svc',
      image: 'img',
      ports: [ { hostPort: 8080, containerPort: 80 }, { hostPort: 8443, containerPort: 443 } ],
      restartPolicy: 'always',
      flags: [],
    })).toEqual([ 'run', '-d', '--name', 'svc', '--restart', 'always', '-p', '8080:80', '-p', '8443:443', 'img' ]);
  });
});
