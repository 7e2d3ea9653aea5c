export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'GATEWAY_FAILED'
  | 'STORAGE_FAILED'
  | 'SESSION_REFERENCE'
  | 'SESSION_NOT_FOUND';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/** Missing or malformed process configuration. Fatal at startup. */
export class ConfigError extends AppError {
  constructor(
    public readonly issues: string[],
  ) {
    super('CONFIG_INVALID', `Configuration validation failed:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * The external agent service was unreachable, answered with a non-success
 * status, or dropped a stream.
 */
export class GatewayError extends AppError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super('GATEWAY_FAILED', message, options);
    this.name = 'GatewayError';
  }
}

export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown; code?: ErrorCode }) {
    super(options?.code ?? 'STORAGE_FAILED', message, options);
    this.name = 'StorageError';
  }
}

/** A write referenced a session row that does not exist. */
export class SessionReferenceError extends StorageError {
  constructor(public readonly sessionId: string) {
    super(`Session does not exist: ${sessionId}`, { code: 'SESSION_REFERENCE' });
    this.name = 'SessionReferenceError';
  }
}

export class SessionNotFoundError extends AppError {
  constructor(public readonly sessionId: string) {
    super('SESSION_NOT_FOUND', `Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
