import { ConfigurationError } from '../errors';
import { MAX_TIMER_MS } from '../util/timing';

/**
 * Everything the watchdog needs to know about the one service it keeps alive.
 * Built once at startup and passed explicitly to every component.
 */
export interface ServiceDescriptor {
  readonly name: string;
  readonly image: string;
  /** Host the readiness TCP probe connects to. */
  readonly host: string;
  /** Published (host side) port. */
  readonly port: number;
  readonly containerPort: number;
  /** Extra runtime arguments, e.g. GPU passthrough. */
  readonly runtimeFlags: readonly string[];
  readonly restartPolicy: string;
  readonly readinessAttempts: number;
  readonly pollIntervalMs: number;
  readonly checkIntervalMs: number;
  readonly checkTimeoutMs: number;
  /** Budget for mutating runtime calls; `run` may pull the image within it. */
  readonly commandTimeoutMs: number;
  /** When false, a container without a runtime health check counts as healthy on that axis. */
  readonly requireHealthcheck: boolean;
  /** Sleep multiplier applied per consecutive failed recovery. 1 disables backoff. */
  readonly backoffMultiplier: number;
  readonly maxBackoffMs: number;
  /** Raise an extra alarm after this many failed recoveries in a row. 0 disables it. */
  readonly maxConsecutiveFailures: number;
}

export type ServiceDescriptorInput = {
  -readonly [K in keyof ServiceDescriptor]?: ServiceDescriptor[K];
};

export const DEFAULT_DESCRIPTOR: ServiceDescriptor = Object.freeze({
  name: 'sp1-gpu',
  image: 'public.ecr.aws/succinct-labs/moongate:v5.0.0',
  host: 'localhost',
  port: 3000,
  containerPort: 3000,
  runtimeFlags: Object.freeze([ '--gpus', 'all' ]),
  restartPolicy: 'unless-stopped',
  readinessAttempts: 30,
  pollIntervalMs: 2_000,
  checkIntervalMs: 30_000,
  checkTimeoutMs: 5_000,
  commandTimeoutMs: 900_000,
  requireHealthcheck: false,
  backoffMultiplier: 1,
  maxBackoffMs: 600_000,
  maxConsecutiveFailures: 0,
});

const CONTAINER_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/u;

/**
 * Validates and freezes a descriptor. Later layers win over earlier ones; fields no layer
 * defines fall back to {@link DEFAULT_DESCRIPTOR}, except `containerPort`, which follows `port`.
 */
export function createServiceDescriptor(...layers: ServiceDescriptorInput[]): ServiceDescriptor {
  const find = <K extends keyof ServiceDescriptor>(key: K): ServiceDescriptor[K] | undefined => {
    for (let i = layers.length - 1; i >= 0; i--) {
      const value: ServiceDescriptor[K] | undefined = layers[i][key];
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  };
  const pick = <K extends keyof ServiceDescriptor>(key: K): ServiceDescriptor[K] => find(key) ?? DEFAULT_DESCRIPTOR[key];

  const port = pick('port');
  const descriptor: ServiceDescriptor = {
    name: pick('name'),
    image: pick('image'),
    host: pick('host'),
    port,
    // Unless set, the container listens on the published port.
    containerPort: find('containerPort') ?? port,
    runtimeFlags: Object.freeze([ ...pick('runtimeFlags') ]),
    restartPolicy: pick('restartPolicy'),
    readinessAttempts: pick('readinessAttempts'),
    pollIntervalMs: pick('pollIntervalMs'),
    checkIntervalMs: pick('checkIntervalMs'),
    checkTimeoutMs: pick('checkTimeoutMs'),
    commandTimeoutMs: pick('commandTimeoutMs'),
    requireHealthcheck: pick('requireHealthcheck'),
    backoffMultiplier: pick('backoffMultiplier'),
    maxBackoffMs: pick('maxBackoffMs'),
    maxConsecutiveFailures: pick('maxConsecutiveFailures'),
  };

  if (!CONTAINER_NAME.test(descriptor.name)) {
    throw new ConfigurationError(`Invalid container name: "${descriptor.name}"`);
  }
  if (descriptor.image.trim().length === 0) {
    throw new ConfigurationError('Image reference must not be empty');
  }
  if (descriptor.host.trim().length === 0) {
    throw new ConfigurationError('Probe host must not be empty');
  }
  assertPort('port', descriptor.port);
  assertPort('containerPort', descriptor.containerPort);
  assertPositiveInteger('readinessAttempts', descriptor.readinessAttempts);
  assertDelay('pollIntervalMs', descriptor.pollIntervalMs);
  assertDelay('checkIntervalMs', descriptor.checkIntervalMs);
  assertDelay('checkTimeoutMs', descriptor.checkTimeoutMs);
  assertDelay('commandTimeoutMs', descriptor.commandTimeoutMs);
  assertDelay('maxBackoffMs', descriptor.maxBackoffMs);
  if (!Number.isFinite(descriptor.backoffMultiplier) || descriptor.backoffMultiplier < 1) {
    throw new ConfigurationError(`backoffMultiplier must be >= 1, got ${descriptor.backoffMultiplier}`);
  }
  if (!Number.isInteger(descriptor.maxConsecutiveFailures) || descriptor.maxConsecutiveFailures < 0) {
    throw new ConfigurationError(
      `maxConsecutiveFailures must be a non-negative integer, got ${descriptor.maxConsecutiveFailures}`,
    );
  }

  return Object.freeze(descriptor);
}

/**
 * Reads descriptor fields from WATCHDOG_* environment variables.
 * Unset variables stay undefined so later layers (or defaults) apply.
 */
export function descriptorFromEnv(env: NodeJS.ProcessEnv): ServiceDescriptorInput {
  return {
    name: readString(env.WATCHDOG_CONTAINER_NAME),
    image: readString(env.WATCHDOG_IMAGE),
    host: readString(env.WATCHDOG_HOST),
    port: readNumber('WATCHDOG_PORT', env.WATCHDOG_PORT),
    containerPort: readNumber('WATCHDOG_CONTAINER_PORT', env.WATCHDOG_CONTAINER_PORT),
    runtimeFlags: readList(env.WATCHDOG_RUNTIME_FLAGS),
    restartPolicy: readString(env.WATCHDOG_RESTART_POLICY),
    readinessAttempts: readNumber('WATCHDOG_READY_ATTEMPTS', env.WATCHDOG_READY_ATTEMPTS),
    pollIntervalMs: readNumber('WATCHDOG_POLL_INTERVAL_MS', env.WATCHDOG_POLL_INTERVAL_MS),
    checkIntervalMs: readNumber('WATCHDOG_CHECK_INTERVAL_MS', env.WATCHDOG_CHECK_INTERVAL_MS),
    checkTimeoutMs: readNumber('WATCHDOG_CHECK_TIMEOUT_MS', env.WATCHDOG_CHECK_TIMEOUT_MS),
    commandTimeoutMs: readNumber('WATCHDOG_COMMAND_TIMEOUT_MS', env.WATCHDOG_COMMAND_TIMEOUT_MS),
    requireHealthcheck: readBoolean(env.WATCHDOG_REQUIRE_HEALTHCHECK),
    backoffMultiplier: readNumber('WATCHDOG_BACKOFF_MULTIPLIER', env.WATCHDOG_BACKOFF_MULTIPLIER),
    maxBackoffMs: readNumber('WATCHDOG_MAX_BACKOFF_MS', env.WATCHDOG_MAX_BACKOFF_MS),
    maxConsecutiveFailures: readNumber('WATCHDOG_MAX_CONSECUTIVE_FAILURES', env.WATCHDOG_MAX_CONSECUTIVE_FAILURES),
  };
}

/**
 * The readiness budget of one recovery cycle.
 */
export function readinessBudgetMs(descriptor: ServiceDescriptor): number {
  return descriptor.readinessAttempts * descriptor.pollIntervalMs;
}

export function readString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function readBoolean(value: string | undefined): boolean | undefined {
  const normalized = readString(value)?.toLowerCase();
  if (normalized === undefined) {
    return undefined;
  }
  return [ 'true', '1', 'yes', 'on' ].includes(normalized);
}

function readNumber(label: string, value: string | undefined): number | undefined {
  const trimmed = readString(value);
  if (trimmed === undefined) {
    return undefined;
  }
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${label} must be a number, got "${trimmed}"`);
  }
  return parsed;
}

function readList(value: string | undefined): string[] | undefined {
  const trimmed = readString(value);
  return trimmed === undefined ? undefined : trimmed.split(/\s+/u);
}

function assertPort(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > 65_535) {
    throw new ConfigurationError(`${label} must be an integer between 1 and 65535, got ${value}`);
  }
}

function assertPositiveInteger(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${label} must be a positive integer, got ${value}`);
  }
}

function assertDelay(label: string, value: number): void {
  assertPositiveInteger(label, value);
  if (value > MAX_TIMER_MS) {
    throw new ConfigurationError(`${label} must not exceed ${MAX_TIMER_MS}ms, got ${value}`);
  }
}
