import pino from 'pino';
import { getErrorMessage } from '../errors.js';
import { DEFAULT_SEPARATOR } from '../redaction/filter.js';
import type { Row, RowQuery, StreamSummary } from '../types.js';
import type { Connection, DataSource } from './source.js';

/** Columns of the users table, in select order. */
export const USER_COLUMNS: readonly string[] = Object.freeze([
  'name',
  'email',
  'phone',
  'ssn',
  'password',
  'ip',
  'last_login',
  'user_agent',
]);

/**
 * Where streamed messages go. A redacting pino logger satisfies this.
 */
export interface RowLogger {
  info(msg: string): void;
}

export interface StreamOptions {
  separator?: string;   // default: ';'
  log?: pino.Logger;    // operational events; default: silent
}

const SEGMENT_TERMINATOR = ';';

/**
 * Render a value so it stays inside its own segment: the separator and
 * `;` become spaces.
 */
function formatValue(value: unknown, separator: string): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).split(SEGMENT_TERMINATOR).join(' ').split(separator).join(' ');
}

/**
 * Build `col=value; col=value; ...;` from a row in column order.
 * Values are not redacted here; that happens in the logger.
 */
export function formatRow(columns: readonly string[], row: Row, separator: string = DEFAULT_SEPARATOR): string {
  if (columns.length === 0) return '';

  const segments = columns.map((column, index) => `${column}=${formatValue(row[index], separator)}`);
  return `${segments.join(`${separator} `)}${separator}`;
}

async function closeAfterFailure(connection: Connection, log: pino.Logger): Promise<void> {
  try {
    await connection.close();
  } catch (error) {
    // The original failure is what the caller sees
    log.warn({ err: getErrorMessage(error) }, 'Failed to close connection after stream failure');
  }
}

/**
 * Stream every row of `query` into `logger` at INFO, one message per row.
 *
 * Any connect or query failure aborts the run and propagates; the
 * connection is closed on every exit path. No retries.
 */
export async function streamRows(
  source: DataSource,
  query: RowQuery,
  logger: RowLogger,
  options: StreamOptions = {}
): Promise<StreamSummary> {
  const separator = options.separator ?? DEFAULT_SEPARATOR;
  const log = options.log ?? pino({ level: 'silent' });
  const startTime = Date.now();

  const connection = await source.connect();
  log.info({ table: query.table, columns: query.columns.length }, 'Connected, streaming rows');

  let rowCount = 0;
  try {
    const rows = await connection.select(query);
    for (const row of rows) {
      logger.info(formatRow(query.columns, row, separator));
      rowCount++;
    }
  } catch (error) {
    await closeAfterFailure(connection, log);
    throw error;
  }

  await connection.close();

  const durationMs = Date.now() - startTime;
  log.info({ table: query.table, rowCount, durationMs }, 'Stream completed');
  return { rowCount, durationMs };
}
