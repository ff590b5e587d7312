/**
 * Tiered Cache File System Storage
 *
 * Local disk tier of the tiered cache.
 */

export { tempPathFor, writeAtomic } from "./atomic-write.ts";
export {
  encodeIndexEntry,
  type FsStorageConfig,
  INDEX_ENTRY_VERSION,
  type IndexEntry,
  IndexEntrySchema,
  startFsStorage,
} from "./fs-storage.ts";
