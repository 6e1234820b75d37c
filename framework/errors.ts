/**
 * Framework Errors
 *
 * Configuration errors are thrown while the application is being set up.
 * HTTP errors are thrown by handlers and turned into responses.
 */

export type ConfigurationErrorCode =
  | 'UNSUPPORTED_KIND'
  | 'UNCLOSED_PARAMETER'
  | 'WILDCARD'
  | 'INVALID_PARAMETER'
  | 'INVALID_METHOD'
  | 'INVALID_PRIORITY'
  | 'PARAMETER_MISMATCH'
  | 'PARAMETER_TYPE'
  | 'DUPLICATE_ROUTE_NAME'
  | 'CHAIN_BUILT'
  | 'INVALID_CONFIG';

/**
 * Base class for every error raised by the framework
 */
export class SwitchyardError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised during setup: bad templates, bad handlers, late middleware.
 */
export class ConfigurationError extends SwitchyardError {
  declare readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

/**
 * An error that maps to an HTTP status
 */
export class HttpError extends SwitchyardError {
  readonly status: number;
  readonly expose: boolean;

  constructor(status: number, message: string, options: { expose?: boolean; cause?: unknown } = {}) {
    super(`HTTP_${status}`, message, { cause: options.cause });
    this.status = status;
    // Client errors are safe to show; server errors are not unless asked.
    this.expose = options.expose ?? status < 500;
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
