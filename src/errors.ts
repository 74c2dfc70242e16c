export class ConfigurationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A single health sub-check exceeded its time budget.
 * Callers treat it as a negative signal, never as a fatal error.
 */
export class ProbeTimeoutError extends Error {
  public constructor(
    public readonly check: string,
    public readonly timeoutMs: number,
  ) {
    super(`${check} timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
  }
}

/**
 * The container runtime itself cannot be reached (binary missing, daemon down).
 */
export class RuntimeUnavailableError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'RuntimeUnavailableError';
  }
}

/**
 * A runtime command ran but failed.
 */
export class ContainerRuntimeError extends Error {
  public constructor(
    message: string,
    public readonly command: string,
  ) {
    super(message);
    this.name = 'ContainerRuntimeError';
  }
}

export class RecoveryTimedOutError extends Error {
  public constructor(
    public readonly service: string,
    public readonly attempts: number,
  ) {
    super(`${service} did not become ready after ${attempts} readiness checks`);
    this.name = 'RecoveryTimedOutError';
  }
}

export class RecoveryRuntimeError extends Error {
  public constructor(
    public readonly service: string,
    cause: string,
  ) {
    super(`Recreating ${service} failed: ${cause}`);
    this.name = 'RecoveryRuntimeError';
  }
}

export class PermissionError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'PermissionError';
  }
}

export class InstallError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'InstallError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
