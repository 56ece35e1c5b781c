import { ConfigurationError } from './errors.js';
import type { DatabaseConfig } from './types.js';

export const ENV_KEYS = {
  user: 'PERSONAL_DATA_DB_USERNAME',
  password: 'PERSONAL_DATA_DB_PASSWORD',
  host: 'PERSONAL_DATA_DB_HOST',
  port: 'PERSONAL_DATA_DB_PORT',
  database: 'PERSONAL_DATA_DB_NAME',
} as const;

/**
 * Read database credentials from the environment.
 *
 * Username defaults to 'root', password to empty, host to 'localhost',
 * port to 5432. The database name has no default.
 *
 * @throws ConfigurationError if the database name is missing or the port is invalid
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const database = env[ENV_KEYS.database];
  if (!database) {
    throw new ConfigurationError(
      `Database name must be specified in the environment variable ${ENV_KEYS.database}`
    );
  }

  const rawPort = env[ENV_KEYS.port] || '5432';
  const port = parseInt(rawPort, 10);
  if (isNaN(port) || port < 1 || port > 65535 || String(port) !== rawPort.trim()) {
    throw new ConfigurationError(`${ENV_KEYS.port} must be a port number between 1 and 65535, got "${rawPort}"`);
  }

  return {
    host: env[ENV_KEYS.host] || 'localhost',
    port,
    user: env[ENV_KEYS.user] || 'root',
    password: env[ENV_KEYS.password] ?? '',
    database,
  };
}
