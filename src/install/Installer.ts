import { getLoggerFor } from 'global-logger-factory';
import type { ServiceDescriptor } from '../descriptor/ServiceDescriptor';
import { InstallError } from '../errors';
import { sleep } from '../util/timing';
import type { InitSystem } from './InitSystem';
import { descriptorToArgs, renderUnit, unitNameFor } from './unit';

export interface InstallOptions {
  /** How to launch this CLI, e.g. `[process.execPath, '/opt/watchdog/dist/cli/index.js']`. */
  command: readonly string[];
  workingDirectory: string;
  /** Flags appended after the descriptor flags (logging, alerting). */
  extraArgs?: readonly string[];
  logTarget?: string;
}

export interface InstallResult {
  unitName: string;
  unitPath: string;
  contents: string;
}

export interface InstallerOptions {
  initSystem: InitSystem;
  activationAttempts?: number;
  activationIntervalMs?: number;
}

/**
 * Registers the watchdog with the host init system so it is started on boot and
 * restarted whenever it exits.
 */
export class Installer {
  private readonly logger = getLoggerFor(this);
  private readonly initSystem: InitSystem;
  private readonly activationAttempts: number;
  private readonly activationIntervalMs: number;

  public constructor(options: InstallerOptions) {
    this.initSystem = options.initSystem;
    this.activationAttempts = options.activationAttempts ?? 10;
    this.activationIntervalMs = options.activationIntervalMs ?? 1_000;
  }

  /**
   * Writes the unit (overwriting any earlier one for the same service), enables it and
   * starts it. Resolves once the init system reports the unit active; the service's own
   * health is the supervision loop's business.
   */
  public async install(descriptor: ServiceDescriptor, options: InstallOptions): Promise<InstallResult> {
    const unitName = unitNameFor(descriptor);
    this.logger.info(`Installing ${unitName}...`);

    const unit = renderUnit({
      unitName,
      description: `Service watchdog for container ${descriptor.name}`,
      execStart: [ ...options.command, 'monitor', ...descriptorToArgs(descriptor), ...(options.extraArgs ?? []) ],
      workingDirectory: options.workingDirectory,
      logTarget: options.logTarget,
    });

    const unitPath = await this.initSystem.writeUnit(unitName, unit.contents);
    await this.initSystem.reload();
    await this.initSystem.enable(unitName);
    await this.initSystem.restart(unitName);
    await this.waitForActivation(unitName);

    this.logger.info(`${unitName} installed and started`);
    this.logger.info(`Check status: systemctl status ${unitName}`);
    this.logger.info(`View logs: journalctl -u ${unitName} -f`);
    return { unitName, unitPath, contents: unit.contents };
  }

  private async waitForActivation(unitName: string): Promise<void> {
    for (let attempt = 1; attempt <= this.activationAttempts; attempt++) {
      if (await this.initSystem.isActive(unitName)) {
        return;
      }
      if (attempt < this.activationAttempts) {
        await sleep(this.activationIntervalMs);
      }
    }
    throw new InstallError(`${unitName} did not become active after ${this.activationAttempts} checks`);
  }
}
