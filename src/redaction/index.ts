export {
  PII_FIELDS,
  DEFAULT_REDACTION,
  DEFAULT_SEPARATOR,
  buildFieldPattern,
  filterDatum,
} from './filter.js';
export { RedactingFormatter, DEFAULT_TAG, normalizeFields } from './formatter.js';
