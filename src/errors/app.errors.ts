/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - missing file, missing key or an invariant violation.
 * Fatal at startup: raised before any order can be placed.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Authentication error - the broker rejected the credentials or profile check
 */
export class AuthError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "AUTH_ERROR", cause);
  }
}

/**
 * Connection failure - the streaming transport dropped or could not connect
 */
export class ConnectionError extends AppError {
  constructor(
    message: string,
    public readonly url?: string,
    public readonly closeCode?: number,
    cause?: Error,
  ) {
    super(message, "CONNECTION_ERROR", cause);
  }
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
