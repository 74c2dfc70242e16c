import path from 'node:path';
import dotenv from 'dotenv';
import { setGlobalLoggerFactory } from 'global-logger-factory';
import type { Argv } from 'yargs';
import { NoopNotifier, WallNotifier, type Notifier } from '../alert/Notifier';
import {
  createServiceDescriptor,
  descriptorFromEnv,
  readBoolean,
  readString,
  type ServiceDescriptor,
  type ServiceDescriptorInput,
} from '../descriptor/ServiceDescriptor';
import { ConfigurationError } from '../errors';
import { ConfigurableLoggerFactory } from '../logging/ConfigurableLoggerFactory';
import { HealthProber } from '../probe/HealthProber';
import { TcpPortProbe } from '../probe/TcpPortProbe';
import { RecoveryController } from '../recovery/RecoveryController';
import { DockerCliRuntime } from '../runtime/DockerCliRuntime';
import type { ContainerRuntime } from '../runtime/types';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface ServiceArgs {
  name?: string;
  image?: string;
  host?: string;
  port?: number;
  'container-port'?: number;
  'runtime-flag'?: string[];
  'restart-policy'?: string;
  'ready-attempts'?: number;
  'poll-interval'?: number;
  'check-interval'?: number;
  'check-timeout'?: number;
  'command-timeout'?: number;
  'require-healthcheck'?: boolean;
  'backoff-multiplier'?: number;
  'max-backoff'?: number;
  'max-failures'?: number;
  env?: string;
  'log-file'?: string;
  'log-level'?: string;
  'log-rotate'?: boolean;
  'docker-bin'?: string;
  wall?: boolean;
}

export interface WatchdogSettings {
  /** Base log file. With `logRotate` the dated files sit beside it. */
  logFile: string;
  logLevel: string;
  logRotate: boolean;
  dockerBin: string;
  wall: boolean;
}

export interface WatchdogContext {
  descriptor: ServiceDescriptor;
  settings: WatchdogSettings;
  runtime: ContainerRuntime;
  prober: HealthProber;
  recovery: RecoveryController;
  notifier: Notifier;
}

/**
 * Options shared by every subcommand. None has a yargs default, so an unset flag falls
 * through to the matching WATCHDOG_* variable and then to the built-in default.
 */
export function withServiceOptions<T>(yargs: Argv<T>) {
  return yargs
    .option('name', { alias: 'n', type: 'string', description: 'Container name' })
    .option('image', { alias: 'i', type: 'string', description: 'Image reference' })
    .option('host', { type: 'string', description: 'Host the port probe connects to' })
    .option('port', { alias: 'p', type: 'number', description: 'Published (host) port' })
    .option('container-port', { type: 'number', description: 'Port inside the container (defaults to --port)' })
    .option('runtime-flag', { type: 'string', array: true, description: 'Extra container runtime argument (repeatable)' })
    .option('restart-policy', { type: 'string', description: 'Container restart policy' })
    .option('ready-attempts', { type: 'number', description: 'Readiness checks after a recreate' })
    .option('poll-interval', { type: 'number', description: 'Milliseconds between readiness checks' })
    .option('check-interval', { type: 'number', description: 'Milliseconds between supervision checks' })
    .option('check-timeout', { type: 'number', description: 'Per sub-check timeout in milliseconds' })
    .option('command-timeout', { type: 'number', description: 'Timeout of docker run/stop/rm in milliseconds, image pull included' })
    .option('require-healthcheck', { type: 'boolean', description: 'Treat a container without a runtime health check as not healthy' })
    .option('backoff-multiplier', { type: 'number', description: 'Sleep multiplier per consecutive failed recovery' })
    .option('max-backoff', { type: 'number', description: 'Upper bound of the backed-off sleep in milliseconds' })
    .option('max-failures', { type: 'number', description: 'Alarm after this many failed recoveries in a row (0 = off)' })
    .option('env', { alias: 'e', type: 'string', description: 'Path to .env file' })
    .option('log-file', { type: 'string', description: 'Watchdog log file' })
    .option('log-level', { type: 'string', choices: [ 'error', 'warn', 'info', 'verbose', 'debug' ], description: 'Log level' })
    .option('log-rotate', { type: 'boolean', description: 'Rotate the log file daily' })
    .option('docker-bin', { type: 'string', description: 'Container runtime CLI binary' })
    .option('wall', { type: 'boolean', description: 'Broadcast alerts with wall (--no-wall to disable)' });
}

export function descriptorFromArgs(argv: ServiceArgs): ServiceDescriptorInput {
  return {
    name: argv.name,
    image: argv.image,
    host: argv.host,
    port: argv.port,
    containerPort: argv['container-port'],
    runtimeFlags: argv['runtime-flag'],
    restartPolicy: argv['restart-policy'],
    readinessAttempts: argv['ready-attempts'],
    pollIntervalMs: argv['poll-interval'],
    checkIntervalMs: argv['check-interval'],
    checkTimeoutMs: argv['check-timeout'],
    commandTimeoutMs: argv['command-timeout'],
    requireHealthcheck: argv['require-healthcheck'],
    backoffMultiplier: argv['backoff-multiplier'],
    maxBackoffMs: argv['max-backoff'],
    maxConsecutiveFailures: argv['max-failures'],
  };
}

/**
 * Non-descriptor settings. The default log file is per service so several watchdogs can share a directory.
 */
export function resolveSettings(argv: ServiceArgs, env: NodeJS.ProcessEnv, serviceName: string): WatchdogSettings {
  return {
    logFile: path.resolve(argv['log-file'] ?? readString(env.WATCHDOG_LOG_FILE) ?? `logs/${serviceName}-watchdog.log`),
    logLevel: argv['log-level'] ?? readString(env.WATCHDOG_LOG_LEVEL) ?? 'info',
    logRotate: argv['log-rotate'] ?? readBoolean(env.WATCHDOG_LOG_ROTATE) ?? false,
    dockerBin: argv['docker-bin'] ?? readString(env.WATCHDOG_DOCKER_BIN) ?? 'docker',
    wall: argv.wall ?? readBoolean(env.WATCHDOG_WALL) ?? true,
  };
}

/**
 * Flags that carry the non-descriptor settings into an installed unit.
 */
export function settingsToArgs(settings: WatchdogSettings): string[] {
  return [
    '--log-file', settings.logFile,
    '--log-level', settings.logLevel,
    '--docker-bin', settings.dockerBin,
    settings.logRotate ? '--log-rotate' : '--no-log-rotate',
    settings.wall ? '--wall' : '--no-wall',
  ];
}

export function loadEnvFile(envPath: string): void {
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new ConfigurationError(`Cannot load env file ${envPath}: ${result.error.message}`);
  }
}

/**
 * Loads configuration, installs the logger factory and wires the components.
 * Throws `ConfigurationError` on invalid input.
 */
export function createContext(argv: ServiceArgs): WatchdogContext {
  if (argv.env) {
    loadEnvFile(argv.env);
  }
  const descriptor = createServiceDescriptor(descriptorFromEnv(process.env), descriptorFromArgs(argv));
  const settings = resolveSettings(argv, process.env, descriptor.name);

  setGlobalLoggerFactory(new ConfigurableLoggerFactory(settings.logLevel, {
    fileName: settings.logRotate ? rotatedLogPattern(settings.logFile) : settings.logFile,
    rotate: settings.logRotate,
  }));

  const runtime = new DockerCliRuntime({
    binary: settings.dockerBin,
    inspectTimeoutMs: descriptor.checkTimeoutMs,
    commandTimeoutMs: descriptor.commandTimeoutMs,
  });
  const prober = new HealthProber({ runtime, portProbe: new TcpPortProbe() });
  const recovery = new RecoveryController({ runtime, prober });
  const notifier: Notifier = settings.wall ? new WallNotifier() : new NoopNotifier();

  return { descriptor, settings, runtime, prober, recovery, notifier };
}

export function rotatedLogPattern(logFile: string): string {
  return logFile.endsWith('.log') ? `${logFile.slice(0, -'.log'.length)}-%DATE%.log` : `${logFile}-%DATE%`;
}
