export { RedactingDestination } from './destination.js';
export { LoggerRegistry, LOGGER_LEVEL, getDefaultRegistry, makeLogger } from './registry.js';
export type { Logger, LoggerRegistryOptions } from './registry.js';
