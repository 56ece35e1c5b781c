import pino from 'pino';
import { RegistryClosedError } from '../errors.js';
import { PII_FIELDS } from '../redaction/filter.js';
import { RedactingFormatter } from '../redaction/formatter.js';
import type { FormatterOptions, LineWriter } from '../types.js';
import { RedactingDestination } from './destination.js';

export type { Logger } from 'pino';

/** Minimum severity for every redacting logger. Not configurable. */
export const LOGGER_LEVEL = 'info';

export interface LoggerRegistryOptions extends FormatterOptions {
  fields?: Iterable<string>;  // default: PII_FIELDS
  output?: LineWriter;        // default: process.stdout
}

/**
 * Owns the "construct once per name" state for redacting loggers.
 *
 * Lifecycle: init() -> getOrCreate(name)... -> shutdown().
 * A new registry starts initialized. Each name gets one pino logger with
 * exactly one RedactingDestination, created on first request and reused
 * after that, so a second request never attaches a second sink.
 *
 * Pass a registry by reference; tests create their own isolated ones.
 */
export class LoggerRegistry {
  private readonly formatter: RedactingFormatter;
  private readonly output: LineWriter | undefined;
  private loggers = new Map<string, pino.Logger>();
  private closed = false;

  /**
   * @throws ConfigurationError if the field set is empty or malformed
   */
  constructor(options: LoggerRegistryOptions = {}) {
    // Built eagerly so a bad field set fails here, not on first log call
    this.formatter = new RedactingFormatter(options.fields ?? PII_FIELDS, options);
    this.output = options.output;
  }

  /**
   * Open the registry. No-op when already open; reopens after shutdown().
   */
  init(): this {
    this.closed = false;
    return this;
  }

  getOrCreate(name: string): pino.Logger {
    if (this.closed) {
      throw new RegistryClosedError(name);
    }

    const existing = this.loggers.get(name);
    if (existing) return existing;

    const logger = pino(
      {
        level: LOGGER_LEVEL,
        base: null,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      new RedactingDestination(name, this.formatter, this.output)
    );
    this.loggers.set(name, logger);
    return logger;
  }

  has(name: string): boolean {
    return this.loggers.has(name);
  }

  get size(): number {
    return this.loggers.size;
  }

  get fields(): readonly string[] {
    return this.formatter.fields;
  }

  /**
   * Flush and forget every logger. getOrCreate() throws until init() is called again.
   */
  shutdown(): void {
    for (const logger of this.loggers.values()) {
      logger.flush();
    }
    this.loggers.clear();
    this.closed = true;
  }
}

let defaultRegistry: LoggerRegistry | null = null;

/**
 * Process-wide registry holding the canonical PII field set.
 * Created on first use and shut down when the process exits.
 */
export function getDefaultRegistry(): LoggerRegistry {
  if (!defaultRegistry) {
    const registry = new LoggerRegistry();
    process.once('exit', () => registry.shutdown());
    defaultRegistry = registry;
  }
  return defaultRegistry;
}

/**
 * Get the redacting logger for `name`, creating it on first call.
 */
export function makeLogger(name: string, registry: LoggerRegistry = getDefaultRegistry()): pino.Logger {
  return registry.getOrCreate(name);
}
