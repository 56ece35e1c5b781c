/**
 * pii-log library exports
 *
 * - Redaction engine and formatter for `field=value` messages
 * - Redacting pino loggers, one sink per name
 * - Row streaming from PostgreSQL into a redacting logger
 * - bcrypt password hashing
 */

export * from './redaction/index.js';
export * from './logging/index.js';
export * from './data/index.js';
export { hashPassword, isValid, DEFAULT_SALT_ROUNDS } from './auth/password.js';
export { loadDatabaseConfig, ENV_KEYS } from './config.js';
export { ConfigurationError, DataSourceError, RegistryClosedError } from './errors.js';
export type {
  LogRecord,
  FormatterOptions,
  LineWriter,
  Row,
  RowQuery,
  StreamSummary,
  DatabaseConfig,
} from './types.js';
