/** Convert an unknown caught value to a human-readable error message. */
export function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ScanError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ScanError';
  }
}

/** A scan session is already active on this orchestrator. */
export class AlreadyRunningError extends ScanError {
  constructor(state: string) {
    super(`Scan session already active (state: ${state})`);
    this.name = 'AlreadyRunningError';
  }
}

/** The radio subscription could not be started or failed while running. */
export class TransportError extends ScanError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
