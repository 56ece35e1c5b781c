import { createInterface } from 'readline';
import pc from 'picocolors';
import { ConfigurationError } from '../../errors.js';
import { RedactingFormatter } from '../../redaction/formatter.js';
import type { LineWriter } from '../../types.js';

export interface FilterCommandOptions {
  fields: readonly string[];
  separator: string;
  redaction: string;
}

/**
 * Print each message redacted. Reads lines from `input` when no
 * message is given on the command line.
 *
 * @returns Exit code (0=success, 2=configuration error)
 */
export async function runFilter(
  messages: readonly string[],
  options: FilterCommandOptions,
  input: NodeJS.ReadableStream = process.stdin,
  output: LineWriter = process.stdout
): Promise<number> {
  let formatter: RedactingFormatter;
  try {
    formatter = new RedactingFormatter(options.fields, {
      separator: options.separator,
      redaction: options.redaction,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(pc.red(`Error: ${error.message}`));
      return 2;
    }
    throw error;
  }

  if (messages.length > 0) {
    for (const message of messages) {
      output.write(`${formatter.redact(message)}\n`);
    }
    return 0;
  }

  const lines = createInterface({ input, crlfDelay: Infinity });
  for await (const line of lines) {
    output.write(`${formatter.redact(line)}\n`);
  }
  return 0;
}
