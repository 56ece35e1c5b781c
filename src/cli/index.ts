#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import pc from 'picocolors';
import { DEFAULT_SALT_ROUNDS } from '../auth/password.js';
import { USER_COLUMNS } from '../data/streamer.js';
import { DEFAULT_REDACTION, DEFAULT_SEPARATOR, PII_FIELDS } from '../redaction/filter.js';
import { runFilter } from './commands/filter.js';
import { runHash, runVerify } from './commands/password.js';
import { runStream } from './commands/stream.js';

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const program = new Command();

program
  .name('pii-log')
  .description('Redact PII from field=value log lines and stream database rows through a redacting logger')
  .version('0.1.0');

program
  .command('stream', { isDefault: true })
  .description('Log every row of a table through the redacting logger')
  .option('--table <name>', 'Table to read (default: users)', 'users')
  .option('--columns <list>', 'Comma-separated columns, in output order', USER_COLUMNS.join(','))
  .option('--redact <list>', 'Extra comma-separated fields to redact', '')
  .option('--strict', 'Fail when a sensitive-looking column is not redacted', false)
  .option('--logger-name <name>', 'Name shown in each log line (default: user_data)', 'user_data')
  .action(async (options) => {
    const columns = parseList(options.columns);
    if (columns.length === 0) {
      console.error(pc.red('Error: --columns must name at least one column'));
      process.exit(2);
    }

    const exitCode = await runStream({
      table: options.table,
      columns,
      redact: parseList(options.redact),
      strict: Boolean(options.strict),
      loggerName: options.loggerName,
    });

    process.exit(exitCode);
  });

program
  .command('filter')
  .description('Redact messages given as arguments, or each line of stdin')
  .argument('[messages...]', 'Messages to redact')
  .option('--fields <list>', 'Comma-separated fields to redact', PII_FIELDS.join(','))
  .option('--separator <char>', 'Segment separator', DEFAULT_SEPARATOR)
  .option('--redaction <mask>', 'Replacement for redacted values', DEFAULT_REDACTION)
  .action(async (messages: string[], options) => {
    const exitCode = await runFilter(messages, {
      fields: parseList(options.fields),
      separator: options.separator,
      redaction: options.redaction,
    });
    process.exit(exitCode);
  });

program
  .command('hash')
  .description('Print a salted bcrypt digest of a password')
  .argument('<password>', 'Plain-text password')
  .option('--rounds <number>', `bcrypt cost factor (default: ${DEFAULT_SALT_ROUNDS})`, String(DEFAULT_SALT_ROUNDS))
  .action(async (password: string, options) => {
    const rounds = parseInt(options.rounds, 10);
    if (isNaN(rounds) || rounds < 4 || rounds > 31) {
      console.error(pc.red('Error: --rounds must be a number between 4 and 31'));
      process.exit(2);
    }
    process.exit(await runHash(password, rounds));
  });

program
  .command('verify')
  .description('Check a password against a digest')
  .argument('<digest>', 'Digest printed by "hash"')
  .argument('<password>', 'Plain-text password')
  .action(async (digest: string, password: string) => {
    process.exit(await runVerify(digest, password));
  });

program.parseAsync().catch((error: unknown) => {
  console.error(pc.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
