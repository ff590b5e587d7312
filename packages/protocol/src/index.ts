/**
 * Cache helper protocol - wire schemas and request loop
 *
 * @packageDocumentation
 */

// ============================================================================
// Wire schemas
// ============================================================================

export type { Command, Request, Response } from "./wire.ts";
export {
  BodySchema,
  CommandSchema,
  decodeBody,
  decodeRequest,
  encodeResponse,
  KNOWN_COMMANDS,
  RequestSchema,
} from "./wire.ts";

// ============================================================================
// Request loop
// ============================================================================

export {
  type CacheHandlers,
  type CacheProcess,
  type CacheProcessOptions,
  type CacheProcessStats,
  createCacheProcess,
} from "./process.ts";
