/**
 * Custom error classes for typed error handling.
 * Use instanceof checks instead of fragile string matching.
 */

/**
 * Invalid or missing configuration: empty field set, malformed field
 * name, missing environment value. Raised at construction, never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The data source could not be reached or the query failed.
 * Raised after the connection has been released.
 */
export class DataSourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataSourceError';
  }
}

export class RegistryClosedError extends Error {
  constructor(loggerName: string) {
    super(`Logger registry is shut down; cannot create logger "${loggerName}"`);
    this.name = 'RegistryClosedError';
  }
}

/**
 * Extract error message safely without exposing internal details
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return 'Unknown error';
}
