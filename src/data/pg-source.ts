import pg from 'pg';
import pino from 'pino';
import { DataSourceError, getErrorMessage } from '../errors.js';
import type { DatabaseConfig, Row, RowQuery } from '../types.js';
import type { Connection, DataSource } from './source.js';

/**
 * Quote a possibly schema-qualified identifier ("public.users").
 */
function quoteIdentifier(client: pg.Client, identifier: string): string {
  return identifier
    .split('.')
    .map((part) => client.escapeIdentifier(part))
    .join('.');
}

class PgConnection implements Connection {
  private client: pg.Client;
  private log: pino.Logger;
  private closed = false;

  constructor(client: pg.Client, log: pino.Logger) {
    this.client = client;
    this.log = log;
  }

  async select(query: RowQuery): Promise<Row[]> {
    const columns = query.columns.map((column) => quoteIdentifier(this.client, column)).join(', ');
    const text = `SELECT ${columns} FROM ${quoteIdentifier(this.client, query.table)}`;

    try {
      const result = await this.client.query({ text, rowMode: 'array' });
      return result.rows;
    } catch (error) {
      throw new DataSourceError(`Query on ${query.table} failed: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.client.end();
      this.log.debug('Database connection closed');
    } catch (error) {
      throw new DataSourceError(`Failed to close database connection: ${getErrorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * PostgreSQL data source. One pg.Client per connect() call; the
 * credentials come from DatabaseConfig and are never logged.
 */
export class PgDataSource implements DataSource {
  private config: DatabaseConfig;
  private log: pino.Logger;

  constructor(config: DatabaseConfig, logger?: pino.Logger) {
    this.config = config;
    this.log = logger ?? pino({ level: 'silent' });
  }

  async connect(): Promise<Connection> {
    const { host, port, user, password, database } = this.config;
    const client = new pg.Client({ host, port, user, password, database });

    try {
      await client.connect();
    } catch (error) {
      throw new DataSourceError(
        `Failed to connect to database "${database}" at ${host}:${port}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }

    this.log.debug({ host, port, database }, 'Database connection opened');
    return new PgConnection(client, this.log);
  }
}
