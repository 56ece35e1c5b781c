import pc from 'picocolors';
import { loadDatabaseConfig } from '../../config.js';
import { findUncoveredColumns } from '../../data/coverage.js';
import { PgDataSource } from '../../data/pg-source.js';
import type { DataSource } from '../../data/source.js';
import { streamRows } from '../../data/streamer.js';
import { ConfigurationError, DataSourceError } from '../../errors.js';
import { LoggerRegistry } from '../../logging/registry.js';
import { PII_FIELDS } from '../../redaction/filter.js';
import type { LineWriter } from '../../types.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface StreamCommandOptions {
  table: string;
  columns: readonly string[];
  redact: readonly string[];   // extra fields on top of PII_FIELDS
  strict: boolean;             // abort when a sensitive-looking column is not redacted
  loggerName: string;
}

/**
 * Collaborators the command would otherwise build itself. Tests pass fakes.
 */
export interface StreamCommandDeps {
  env?: NodeJS.ProcessEnv;
  source?: DataSource;
  output?: LineWriter;
  log?: Logger;
}

/**
 * Stream a table through a redacting logger.
 *
 * 1. Builds the field set (PII_FIELDS + --redact) and the registry
 * 2. Checks the column list against the field set (warn, or abort with --strict)
 * 3. Reads database config from the environment
 * 4. Streams every row, one redacted line each
 *
 * @returns Exit code (0=success, 1=data source failure, 2=configuration error)
 */
export async function runStream(options: StreamCommandOptions, deps: StreamCommandDeps = {}): Promise<number> {
  const log = deps.log ?? createLogger();
  const childLogger = log.child({ table: options.table });

  let registry: LoggerRegistry;
  let source: DataSource;
  try {
    registry = new LoggerRegistry({ fields: [...PII_FIELDS, ...options.redact], output: deps.output });

    const uncovered = findUncoveredColumns(options.columns, registry.fields);
    if (uncovered.length > 0) {
      if (options.strict) {
        throw new ConfigurationError(`Columns look sensitive but are not redacted: ${uncovered.join(', ')}`);
      }
      console.error(pc.yellow(`Warning: columns look sensitive but are not redacted: ${uncovered.join(', ')}`));
    }

    source = deps.source ?? new PgDataSource(loadDatabaseConfig(deps.env), childLogger);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(pc.red(`Error: ${error.message}`));
      return 2;
    }
    throw error;
  }

  try {
    const logger = registry.getOrCreate(options.loggerName);
    const summary = await streamRows(
      source,
      { table: options.table, columns: options.columns },
      logger,
      { log: childLogger }
    );
    childLogger.info({ summary }, 'Stream run completed');
    return 0;
  } catch (error) {
    if (error instanceof DataSourceError) {
      childLogger.error({ err: error }, 'Stream run failed');
      console.error(pc.red(`Error: ${error.message}`));
      return 1;
    }
    throw error;
  } finally {
    registry.shutdown();
  }
}
