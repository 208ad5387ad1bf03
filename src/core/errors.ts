export class HealthPulseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'HealthPulseError';
  }
}

export class ConfigError extends HealthPulseError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class PersistenceError extends HealthPulseError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, 'PERSISTENCE_ERROR', 'persist', cause);
    this.name = 'PersistenceError';
  }
}

/**
 * Best-effort message extraction for anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
