export { streamRows, formatRow, USER_COLUMNS } from './streamer.js';
export type { RowLogger, StreamOptions } from './streamer.js';
export { PgDataSource } from './pg-source.js';
export { findUncoveredColumns, SENSITIVE_COLUMN_HINTS } from './coverage.js';
export type { Connection, DataSource } from './source.js';
