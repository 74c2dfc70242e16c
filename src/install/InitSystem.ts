import { execFile } from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import { errorMessage, InstallError, PermissionError } from '../errors';

/**
 * The host init system as seen by the installer.
 */
export interface InitSystem {
  readonly unitDir: string;
  /** Writes (or overwrites) the unit file and returns its path. */
  writeUnit(unitName: string, contents: string): Promise<string>;
  reload(): Promise<void>;
  enable(unitName: string): Promise<void>;
  /** Starts the unit, restarting it when it is already running so a rewritten unit takes effect. */
  restart(unitName: string): Promise<void>;
  isActive(unitName: string): Promise<boolean>;
}

export interface SystemctlInitSystemOptions {
  unitDir?: string;
  systemctl?: string;
  timeoutMs?: number;
}

const ACCESS_DENIED = /access denied|interactive authentication required|permission denied|not permitted/iu;

export class SystemctlInitSystem implements InitSystem {
  private readonly logger = getLoggerFor(this);
  public readonly unitDir: string;
  private readonly systemctl: string;
  private readonly timeoutMs: number;

  public constructor(options: SystemctlInitSystemOptions = {}) {
    this.unitDir = options.unitDir ?? '/etc/systemd/system';
    this.systemctl = options.systemctl ?? 'systemctl';
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  public async writeUnit(unitName: string, contents: string): Promise<string> {
    const unitPath = path.join(this.unitDir, unitName);
    try {
      await fs.mkdir(this.unitDir, { recursive: true });
      await fs.writeFile(unitPath, contents, { encoding: 'utf-8', mode: 0o644 });
    } catch (error: unknown) {
      throw classifyInstallFailure(`write ${unitPath}`, error);
    }
    this.logger.info(`Wrote ${unitPath}`);
    return unitPath;
  }

  public async reload(): Promise<void> {
    await this.run([ 'daemon-reload' ]);
  }

  public async enable(unitName: string): Promise<void> {
    await this.run([ 'enable', unitName ]);
  }

  public async restart(unitName: string): Promise<void> {
    await this.run([ 'restart', unitName ]);
  }

  public async isActive(unitName: string): Promise<boolean> {
    try {
      const stdout = await this.run([ 'is-active', unitName ]);
      return stdout.trim() === 'active';
    } catch (error: unknown) {
      // `is-active` exits non-zero for every state but active.
      if (error instanceof InstallError) {
        return false;
      }
      throw error;
    }
  }

  private run(args: string[]): Promise<string> {
    this.logger.debug(`${this.systemctl} ${args.join(' ')}`);
    return new Promise((resolve, reject) => {
      execFile(this.systemctl, args, { timeout: this.timeoutMs, encoding: 'utf8' }, (error, stdout, stderr) => {
        if (error) {
          const detail = stderr.trim() || stdout.trim() || error.message;
          const failure = Object.assign(new Error(detail), { code: error.code });
          reject(classifyInstallFailure(`${this.systemctl} ${args.join(' ')}`, failure));
          return;
        }
        resolve(stdout);
      });
    });
  }
}

/**
 * Maps a failed filesystem or systemctl call to `PermissionError` when the caller lacks
 * privilege, `InstallError` otherwise.
 */
export function classifyInstallFailure(action: string, error: unknown): Error {
  const message = errorMessage(error);
  const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
  if (code === 'EACCES' || code === 'EPERM' || ACCESS_DENIED.test(message)) {
    return new PermissionError(`Insufficient privilege to ${action}: ${message}. Run as root.`);
  }
  return new InstallError(`Failed to ${action}: ${message}`);
}
