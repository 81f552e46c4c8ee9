/**
 * Configuration error types
 */

export class ConfigError extends Error {
  public readonly code = 'INVALID_CONFIG';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}
