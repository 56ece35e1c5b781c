/**
 * A rendered log call, rebuilt from the serialized pino line just before
 * it is formatted. Never persisted.
 */
export interface LogRecord {
  name: string;
  level: string;     // level label, e.g. 'info'
  time: string;      // ISO-8601
  msg: string;
}

/**
 * Options captured by a RedactingFormatter at construction.
 */
export interface FormatterOptions {
  redaction?: string;  // default: '***'
  separator?: string;  // default: ';'
  tag?: string;        // default: 'PII'
}

/**
 * Anything a formatted line can be written to (process.stdout, a test buffer).
 */
export interface LineWriter {
  write(line: string): unknown;
}

/**
 * One row from the data source, values in the order of the selected columns.
 */
export type Row = readonly unknown[];

/**
 * Table and fixed column order to stream. The schema is configuration,
 * not discovered at runtime.
 */
export interface RowQuery {
  table: string;
  columns: readonly string[];
}

/**
 * Result of a completed streaming run.
 */
export interface StreamSummary {
  rowCount: number;
  durationMs: number;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}
