/**
 * Redaction engine for `field=value` log messages.
 *
 * Field names are data, never pattern fragments: every name is escaped
 * before it joins the alternation. A field only matches when it is not
 * preceded by a word character, so `email` does not match inside
 * `user_email=...` but does after `&`, `(`, `"` or `,`.
 */

export const PII_FIELDS: readonly string[] = Object.freeze([
  'email',
  'password',
  'ssn',
  'phone_number',
  'address',
]);

export const DEFAULT_REDACTION = '***';
export const DEFAULT_SEPARATOR = ';';

/** Always ends a value, whatever the configured separator is. */
const SEGMENT_TERMINATOR = ';';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Escape for use inside a character class, where `-` and `^` are special too. */
function escapeClassChars(value: string): string {
  return value.replace(/[\\\]^-]/g, '\\$&');
}

/**
 * Build the single-pass pattern for a field set.
 *
 * Group 1 is the field name; the value is the run after `=` up to the
 * next separator or terminator, and may be empty.
 * Returns null when no usable field name is given.
 */
export function buildFieldPattern(fields: Iterable<string>, separator: string): RegExp | null {
  const names = [...new Set(fields)].filter((field) => field.length > 0);
  if (names.length === 0) return null;

  const alternation = names.map(escapeRegExp).join('|');
  const stop = escapeClassChars([...new Set(separator + SEGMENT_TERMINATOR)].join(''));

  return new RegExp(`(?<![A-Za-z0-9_])(${alternation})=[^${stop}]*`, 'g');
}

/**
 * Replace the value of every listed field with `redaction`.
 *
 * ```typescript
 * filterDatum(['email', 'password'], '***', 'name=Bob;email=bob@x.com;password=hunter2;', ';');
 * // => 'name=Bob;email=***;password=***;'
 * ```
 *
 * Never throws; returns the message unchanged when nothing matches.
 */
export function filterDatum(
  fields: Iterable<string>,
  redaction: string,
  message: string,
  separator: string = DEFAULT_SEPARATOR
): string {
  if (message.length === 0) return message;

  const pattern = buildFieldPattern(fields, separator);
  if (!pattern) return message;

  // Replacer function so the mask is inserted verbatim ($& etc. stay literal)
  return message.replace(pattern, (_match, field: string) => `${field}=${redaction}`);
}
