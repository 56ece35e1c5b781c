import { ConfigurationError } from '../errors.js';
import type { FormatterOptions, LogRecord } from '../types.js';
import { DEFAULT_REDACTION, DEFAULT_SEPARATOR, filterDatum } from './filter.js';

export const DEFAULT_TAG = 'PII';

/**
 * Validate and copy a field set. Duplicates are dropped (first occurrence
 * wins); the caller's collection is never touched.
 *
 * @throws ConfigurationError if the set is empty or a name is malformed
 */
export function normalizeFields(fields: Iterable<unknown>, separator: string): readonly string[] {
  const unique = new Set<string>();

  for (const field of fields) {
    if (typeof field !== 'string' || field.length === 0) {
      throw new ConfigurationError(`Invalid field name: ${JSON.stringify(field)}`);
    }
    if (/\s|=/.test(field) || field.includes(separator)) {
      throw new ConfigurationError(
        `Field name "${field}" must not contain whitespace, "=" or the separator "${separator}"`
      );
    }
    unique.add(field);
  }

  if (unique.size === 0) {
    throw new ConfigurationError('Field set must contain at least one field name');
  }

  return Object.freeze([...unique]);
}

/**
 * Formats log records as `[TAG] <name> <LEVEL> <time>: <message>`,
 * redacting the message (and only the message) first.
 *
 * Mask, separator and tag are fixed at construction.
 */
export class RedactingFormatter {
  readonly fields: readonly string[];
  readonly redaction: string;
  readonly separator: string;
  readonly tag: string;

  constructor(fields: Iterable<string>, options: FormatterOptions = {}) {
    const separator = options.separator ?? DEFAULT_SEPARATOR;
    if (separator.length !== 1 || separator === '=') {
      throw new ConfigurationError(`Separator must be a single character other than "=", got "${separator}"`);
    }

    this.separator = separator;
    this.fields = normalizeFields(fields, separator);
    this.redaction = options.redaction ?? DEFAULT_REDACTION;
    this.tag = options.tag ?? DEFAULT_TAG;
  }

  /** Redact a bare message with this formatter's configuration. */
  redact(message: string): string {
    return filterDatum(this.fields, this.redaction, message, this.separator);
  }

  format(record: LogRecord): string {
    const message = this.redact(record.msg);
    return `[${this.tag}] ${record.name} ${record.level.toUpperCase()} ${record.time}: ${message}`;
  }
}
