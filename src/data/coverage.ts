/**
 * Name fragments that suggest a column holds PII.
 */
export const SENSITIVE_COLUMN_HINTS: readonly string[] = Object.freeze([
  'email',
  'mail',
  'pass',
  'ssn',
  'phone',
  'address',
  'birth',
  'secret',
  'token',
]);

/**
 * Columns that look sensitive but are not in the field set, and so
 * would reach the log unmasked. Matching is case-insensitive on the
 * column name; the field set itself is matched exactly.
 */
export function findUncoveredColumns(
  columns: readonly string[],
  fields: Iterable<string>,
  hints: readonly string[] = SENSITIVE_COLUMN_HINTS
): string[] {
  const covered = new Set(fields);

  return columns.filter((column) => {
    if (covered.has(column)) return false;
    const lower = column.toLowerCase();
    return hints.some((hint) => lower.includes(hint));
  });
}
