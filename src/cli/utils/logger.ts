import pino from 'pino';

/**
 * Create the operational Pino logger: structured JSON on stderr, kept
 * apart from the redacted data lines on stdout.
 *
 * Features:
 * - Log level from LOG_LEVEL env var (default: 'info')
 * - Automatic redaction of credential fields (password, connectionString, etc.)
 *
 * @returns Pino logger instance
 */
export function createLogger(): pino.Logger {
  return pino(
    {
      name: 'pii-log',
      level: process.env.LOG_LEVEL || 'info',
      redact: {
        paths: [
          'password',
          '*.password',
          'user',
          '*.user',
          'connectionString',
          '*.connectionString',
          'PERSONAL_DATA_DB_PASSWORD',
          'env.PERSONAL_DATA_DB_PASSWORD',
        ],
        censor: '[REDACTED]'
      }
    },
    pino.destination(2)
  );
}

/**
 * Re-export Logger type from pino for use in other modules
 */
export type { Logger } from 'pino';
