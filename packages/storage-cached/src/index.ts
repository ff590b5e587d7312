/**
 * @tiercache/storage-cached
 *
 * Tiered cache: an authoritative local tier with a remote mirror written
 * behind through a bounded queue and read through on local misses.
 */

export {
  PROBE_ACTION_ID,
  startTieredCache,
  type TieredCache,
  type TieredCacheConfig,
  type TieredCacheStats,
  type WorkItem,
} from "./tiered-cache.ts";
export { WorkQueue } from "./work-queue.ts";
