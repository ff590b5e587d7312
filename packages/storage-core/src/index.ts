/**
 * Tiered cache core
 *
 * Shared types, key helpers, counters, errors and logging for the cache tiers.
 */

// Counters
export {
  type CacheCounters,
  type CounterSnapshot,
  CSV_COLUMNS,
  createCacheCounters,
  emptySnapshot,
  formatClockDuration,
  formatCsv,
  formatSeconds,
  formatSummary,
} from "./counters.ts";
// Errors
export { CacheError, type CacheErrorCode, errorMessage, isCacheError } from "./errors.ts";
// Key utilities
export {
  bytesToHex,
  hexToBytes,
  isHexId,
  toBlobFileName,
  toIndexFileName,
  toObjectKey,
} from "./key.ts";
// Logging
export {
  createLogger,
  formatFields,
  LOG_LEVELS,
  type LogFields,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  levelFromVerbosity,
} from "./logger.ts";
// Types
export type {
  ContentStore,
  ContentStoreStarter,
  LocalEntry,
  RemoteMirror,
  RemoteObject,
} from "./types.ts";
