import { describe, it, expect, vi } from 'vitest';
import { DataSourceError } from '../errors.js';
import { LoggerRegistry } from '../logging/registry.js';
import type { Row } from '../types.js';
import type { DataSource } from './source.js';
import { USER_COLUMNS, formatRow, streamRows } from './streamer.js';

// Helper to create an in-memory data source with controllable failures
function createFakeSource(rows: Row[], failures: { connect?: Error; select?: Error; close?: Error } = {}) {
  const connection = {
    select: failures.select
      ? vi.fn().mockRejectedValue(failures.select)
      : vi.fn().mockResolvedValue(rows),
    close: failures.close
      ? vi.fn().mockRejectedValue(failures.close)
      : vi.fn().mockResolvedValue(undefined),
  };
  const source: DataSource = {
    connect: failures.connect
      ? vi.fn().mockRejectedValue(failures.connect)
      : vi.fn().mockResolvedValue(connection),
  };
  return { source, connection };
}

const QUERY = { table: 'users', columns: ['name', 'email'] };

describe('formatRow', () => {
  it('joins column=value segments with separator and trailing separator', () => {
    expect(formatRow(['name', 'email'], ['Bob', 'bob@x.com'])).toBe('name=Bob; email=bob@x.com;');
  });

  it('renders null as empty and dates as ISO-8601', () => {
    const row = [null, new Date('2026-01-02T03:04:05.000Z'), 42];

    expect(formatRow(['a', 'b', 'c'], row)).toBe('a=; b=2026-01-02T03:04:05.000Z; c=42;');
  });

  it('keeps separators inside a value from splitting its segment', () => {
    expect(formatRow(['address', 'name'], ['1 Main St; Apt 4B', 'Bob'])).toBe('address=1 Main St  Apt 4B; name=Bob;');
    expect(formatRow(['address'], ['a|b;c'], '|')).toBe('address=a b c|');
  });

  it('uses the given separator', () => {
    expect(formatRow(['name', 'ssn'], ['Bob', '1'], '|')).toBe('name=Bob| ssn=1|');
  });

  it('returns an empty message for no columns', () => {
    expect(formatRow([], [])).toBe('');
  });
});

describe('streamRows', () => {
  it('logs one message per row and closes the connection', async () => {
    const { source, connection } = createFakeSource([
      ['Bob', 'bob@x.com'],
      ['Alice', 'alice@x.com'],
    ]);
    const logger = { info: vi.fn() };

    const summary = await streamRows(source, QUERY, logger);

    expect(summary.rowCount).toBe(2);
    expect(logger.info).toHaveBeenNthCalledWith(1, 'name=Bob; email=bob@x.com;');
    expect(logger.info).toHaveBeenNthCalledWith(2, 'name=Alice; email=alice@x.com;');
    expect(connection.select).toHaveBeenCalledWith(QUERY);
    expect(connection.close).toHaveBeenCalledTimes(1);
  });

  it('handles an empty table', async () => {
    const { source, connection } = createFakeSource([]);
    const logger = { info: vi.fn() };

    const summary = await streamRows(source, QUERY, logger);

    expect(summary.rowCount).toBe(0);
    expect(logger.info).not.toHaveBeenCalled();
    expect(connection.close).toHaveBeenCalledTimes(1);
  });

  it('propagates connect failures without querying', async () => {
    const { source, connection } = createFakeSource([], { connect: new DataSourceError('unreachable') });

    await expect(streamRows(source, QUERY, { info: vi.fn() })).rejects.toThrow('unreachable');
    expect(connection.select).not.toHaveBeenCalled();
  });

  it('closes the connection and rethrows when the query fails', async () => {
    const { source, connection } = createFakeSource([], { select: new DataSourceError('bad query') });

    await expect(streamRows(source, QUERY, { info: vi.fn() })).rejects.toThrow('bad query');
    expect(connection.close).toHaveBeenCalledTimes(1);
  });

  it('closes the connection and rethrows when logging a row fails', async () => {
    const { source, connection } = createFakeSource([['Bob', 'bob@x.com']]);
    const logger = { info: vi.fn(() => { throw new Error('sink closed'); }) };

    await expect(streamRows(source, QUERY, logger)).rejects.toThrow('sink closed');
    expect(connection.close).toHaveBeenCalledTimes(1);
  });

  it('keeps the original error when closing also fails', async () => {
    const { source } = createFakeSource([], {
      select: new DataSourceError('bad query'),
      close: new DataSourceError('close failed'),
    });

    await expect(streamRows(source, QUERY, { info: vi.fn() })).rejects.toThrow('bad query');
  });

  it('propagates a close failure after a successful stream', async () => {
    const { source } = createFakeSource([['Bob', 'bob@x.com']], { close: new DataSourceError('close failed') });

    await expect(streamRows(source, QUERY, { info: vi.fn() })).rejects.toThrow('close failed');
  });

  it('emits fully redacted user rows through a redacting logger', async () => {
    const lines: string[] = [];
    const registry = new LoggerRegistry({ output: { write: (line: string) => lines.push(line) } });
    const { source } = createFakeSource([
      ['Bob', 'bob@x.com', '555-0100', '123-45-6789', 'hunter2', '10.0.0.1', new Date('2026-01-02T03:04:05.000Z'), 'Mozilla/5.0'],
    ]);

    await streamRows(source, { table: 'users', columns: USER_COLUMNS }, registry.getOrCreate('user_data'));

    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith(
      ': name=Bob; email=***; phone=555-0100; ssn=***; password=***; ip=10.0.0.1; ' +
      'last_login=2026-01-02T03:04:05.000Z; user_agent=Mozilla/5.0;\n'
    )).toBe(true);
    expect(lines[0]).not.toContain('hunter2');
  });
});
