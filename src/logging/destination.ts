import pino from 'pino';
import type { RedactingFormatter } from '../redaction/formatter.js';
import type { LineWriter, LogRecord } from '../types.js';

interface SerializedLine {
  level: number;
  msg?: unknown;
  time?: unknown;
}

const MIN_LEVEL = pino.levels.values.info;

/**
 * Type guard for a line pino serialized with a numeric level
 */
function isSerializedLine(value: unknown): value is SerializedLine {
  return (
    typeof value === 'object' &&
    value !== null &&
    'level' in value &&
    typeof value.level === 'number'
  );
}

function formatMessage(msg: unknown): string {
  if (msg === undefined || msg === null) return '';
  return typeof msg === 'string' ? msg : String(msg);
}

function toIsoTime(time: unknown): string {
  if (typeof time === 'string') return time;
  if (typeof time === 'number') return new Date(time).toISOString();
  return new Date().toISOString();
}

/**
 * Pino destination that turns each serialized line back into a LogRecord,
 * formats it through the RedactingFormatter and writes one text line.
 *
 * Only the message survives into the output; merge-object fields pino
 * serialized alongside it are dropped. The name is always the one the
 * destination was built with, and lines below INFO are dropped here
 * whatever level the emitting logger was set to.
 */
export class RedactingDestination implements pino.DestinationStream {
  private readonly loggerName: string;
  private readonly formatter: RedactingFormatter;
  private readonly output: LineWriter;

  constructor(loggerName: string, formatter: RedactingFormatter, output: LineWriter = process.stdout) {
    this.loggerName = loggerName;
    this.formatter = formatter;
    this.output = output;
  }

  write(chunk: string): void {
    const line = chunk.endsWith('\n') ? chunk.slice(0, -1) : chunk;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      // Not a pino line; still never let it out unredacted
      parsed = null;
    }

    if (!isSerializedLine(parsed)) {
      this.output.write(`${this.formatter.redact(line)}\n`);
      return;
    }

    // Children and level reassignment cannot lower the threshold
    if (parsed.level < MIN_LEVEL) return;

    this.output.write(`${this.formatter.format(this.toRecord(parsed))}\n`);
  }

  private toRecord(line: SerializedLine): LogRecord {
    return {
      name: this.loggerName,
      level: pino.levels.labels[line.level] ?? String(line.level),
      time: toIsoTime(line.time),
      msg: formatMessage(line.msg),
    };
  }
}
