import type { Row, RowQuery } from '../types.js';

/**
 * An open connection to a tabular data source.
 * close() must be called on every exit path.
 */
export interface Connection {
  select(query: RowQuery): Promise<Row[]>;
  close(): Promise<void>;
}

export interface DataSource {
  connect(): Promise<Connection>;
}
