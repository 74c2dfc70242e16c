import { execFile, type ExecFileException } from 'node:child_process';
import { getLoggerFor } from 'global-logger-factory';
import { ContainerRuntimeError, RuntimeUnavailableError } from '../errors';
import type { ContainerRunSpec, ContainerRuntime, ContainerState, RuntimeHealthStatus } from './types';

export interface DockerCliRuntimeOptions {
  binary?: string;
  /** Budget for read-only calls (inspect, logs). */
  inspectTimeoutMs?: number;
  /** Budget for mutating calls (run, stop, rm). `run` pulls a missing image within it. */
  commandTimeoutMs?: number;
}

interface CommandResult {
  stdout: string;
  stderr: string;
}

const DAEMON_UNREACHABLE = /cannot connect to the docker daemon|is the docker daemon running|permission denied while trying to connect/iu;
const NO_SUCH_CONTAINER = /no such (container|object)/iu;

/**
 * {@link ContainerRuntime} backed by the `docker` command line client.
 */
export class DockerCliRuntime implements ContainerRuntime {
  private readonly logger = getLoggerFor(this);
  private readonly binary: string;
  private readonly inspectTimeoutMs: number;
  private readonly commandTimeoutMs: number;

  public constructor(options: DockerCliRuntimeOptions = {}) {
    this.binary = options.binary ?? 'docker';
    this.inspectTimeoutMs = options.inspectTimeoutMs ?? 5_000;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 900_000;
  }

  public async inspect(name: string): Promise<ContainerState | undefined> {
    let result: CommandResult;
    try {
      result = await this.exec([ 'inspect', '--type', 'container', '--format', '{{json .State}}', name ], this.inspectTimeoutMs);
    } catch (error: unknown) {
      if (isNoSuchContainer(error)) {
        return undefined;
      }
      throw error;
    }

    const state = parseJson(result.stdout);
    if (!isRecord(state)) {
      throw new ContainerRuntimeError(`Unexpected inspect output for ${name}: ${result.stdout.trim()}`, 'inspect');
    }
    return {
      name,
      status: typeof state.Status === 'string' ? state.Status : 'unknown',
      running: state.Running === true,
      startedAt: typeof state.StartedAt === 'string' ? state.StartedAt : undefined,
      exitCode: typeof state.ExitCode === 'number' ? state.ExitCode : undefined,
    };
  }

  public async health(name: string): Promise<RuntimeHealthStatus> {
    const result = await this.exec(
      [ 'inspect', '--type', 'container', '--format', '{{json .State.Health}}', name ],
      this.inspectTimeoutMs,
    );
    const health = parseJson(result.stdout);
    if (!isRecord(health)) {
      return 'none';
    }
    switch (health.Status) {
      case 'healthy':
      case 'unhealthy':
      case 'starting':
        return health.Status;
      default:
        return 'none';
    }
  }

  public async run(spec: ContainerRunSpec): Promise<void> {
    await this.exec(buildRunArgs(spec), this.commandTimeoutMs);
  }

  public async stop(name: string): Promise<void> {
    try {
      await this.exec([ 'stop', name ], this.commandTimeoutMs);
    } catch (error: unknown) {
      if (!isNoSuchContainer(error)) {
        throw error;
      }
      this.logger.debug(`stop: container ${name} does not exist`);
    }
  }

  public async remove(name: string): Promise<void> {
    try {
      await this.exec([ 'rm', name ], this.commandTimeoutMs);
    } catch (error: unknown) {
      if (!isNoSuchContainer(error)) {
        throw error;
      }
      this.logger.debug(`rm: container ${name} does not exist`);
    }
  }

  public async logs(name: string, tail: number): Promise<string[]> {
    try {
      // `--tail` applies per stream; container stderr arrives on our stderr.
      const { stdout, stderr } = await this.exec([ 'logs', '--tail', String(tail), name ], this.inspectTimeoutMs);
      return splitLines(`${stdout}\n${stderr}`).slice(-tail);
    } catch (error: unknown) {
      if (isNoSuchContainer(error)) {
        return [];
      }
      throw error;
    }
  }

  private exec(args: string[], timeoutMs: number): Promise<CommandResult> {
    this.logger.debug(`${this.binary} ${args.join(' ')}`);
    return new Promise((resolve, reject) => {
      execFile(
        this.binary,
        args,
        { timeout: timeoutMs, encoding: 'utf8', maxBuffer: 4 * 1024 * 1024 },
        (error: ExecFileException | null, stdout: string, stderr: string) => {
          if (error) {
            reject(this.classify(args, error, stderr, timeoutMs));
            return;
          }
          resolve({ stdout, stderr });
        },
      );
    });
  }

  private classify(args: string[], error: ExecFileException, stderr: string, timeoutMs: number): Error {
    const command = args[0] ?? '';
    if (error.code === 'ENOENT') {
      return new RuntimeUnavailableError(`Container runtime binary "${this.binary}" not found`);
    }
    if (error.killed) {
      return new ContainerRuntimeError(`${this.binary} ${command} timed out after ${timeoutMs}ms`, command);
    }
    const detail = stderr.trim() || error.message;
    if (DAEMON_UNREACHABLE.test(detail)) {
      return new RuntimeUnavailableError(detail);
    }
    return new ContainerRuntimeError(detail, command);
  }
}

export function buildRunArgs(spec: ContainerRunSpec): string[] {
  const args = [ 'run', '-d', '--name', spec.name, '--restart', spec.restartPolicy ];
  for (const { hostPort, containerPort } of spec.ports) {
    args.push('-p', `${hostPort}:${containerPort}`);
  }
  args.push(...spec.flags, spec.image);
  return args;
}

function isNoSuchContainer(error: unknown): boolean {
  return error instanceof ContainerRuntimeError && NO_SUCH_CONTAINER.test(error.message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text.trim());
  } catch {
    return undefined;
  }
}

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
}
