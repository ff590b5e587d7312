/**
 * File System Content Store
 *
 * The local, authoritative tier. One flat directory:
 *
 *   a-{actionId}   JSON index entry {"v":1,"o":outputId,"n":size,"t":unixNanos}
 *   o-{outputId}   raw blob bytes
 *
 * Blob and index are each written atomically (temp file + rename) but as two
 * separate steps; a crash between them leaves an orphan blob, never an index
 * entry pointing at a partial blob.
 */

import { mkdir, open, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { Readable } from "node:stream";
import {
  CacheError,
  type ContentStore,
  type CacheCounters,
  createCacheCounters,
  createLogger,
  type LocalEntry,
  type Logger,
  isHexId,
  toBlobFileName,
  toIndexFileName,
} from "@tiercache/storage-core";
import { z } from "zod";
import { writeAtomic } from "./atomic-write.ts";

/**
 * File System Content Store configuration
 */
export type FsStorageConfig = {
  /** Cache directory */
  basePath: string;
  logger?: Logger;
  counters?: CacheCounters;
};

export const INDEX_ENTRY_VERSION = 1;

export const IndexEntrySchema = z.object({
  v: z.number().int(),
  o: z.string(),
  n: z.number().int().nonnegative(),
  t: z.number(),
});

export type IndexEntry = z.infer<typeof IndexEntrySchema>;

/**
 * Serialize an index entry. `t` is nanoseconds since the epoch, written as
 * exact integer digits: the value is past 2^53, so going through a JSON
 * number would round it.
 */
export const encodeIndexEntry = (outputId: string, size: number, unixNanos: bigint): string => {
  const head = JSON.stringify({ v: INDEX_ENTRY_VERSION, o: outputId, n: size });
  return `${head.slice(0, -1)},"t":${unixNanos}}`;
};

const isNotFound = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
};

/**
 * Start a file system-backed content store: create the cache directory,
 * then resolve the store. There is no store before its directory exists.
 */
export const startFsStorage = async (config: FsStorageConfig): Promise<ContentStore> => {
  const basePath = config.basePath;
  const log = (config.logger ?? createLogger()).child("disk");
  const counters = config.counters ?? createCacheCounters();
  let closed = false;

  const assertOpen = (op: string): void => {
    if (closed) {
      throw new CacheError("Closed", `disk cache ${op} called after close`);
    }
  };

  log.debug("start", { dir: basePath });
  await mkdir(basePath, { recursive: true, mode: 0o755 });

  const get = async (actionId: string): Promise<LocalEntry | null> => {
    assertOpen("get");
    counters.countGet();
    log.debug("get", { actionID: actionId });

    let raw: string;
    try {
      raw = await readFile(join(basePath, toIndexFileName(actionId)), "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        counters.countMiss();
        return null;
      }
      counters.countGetError();
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.error("json error", { actionID: actionId, err: error });
      counters.countGetError();
      return null;
    }

    const entry = IndexEntrySchema.safeParse(parsed);
    if (!entry.success) {
      log.error("malformed index entry", { actionID: actionId, err: entry.error.message });
      counters.countGetError();
      return null;
    }

    // Never turn an unchecked output ID from disk into a path
    if (!isHexId(entry.data.o)) {
      log.warn("non-hex output ID in index entry", { actionID: actionId });
      counters.countGetError();
      return null;
    }

    counters.countHit();
    return {
      outputId: entry.data.o,
      diskPath: join(basePath, toBlobFileName(entry.data.o)),
    };
  };

  const writeBlob = async (blobPath: string, size: number, body: Readable): Promise<void> => {
    // Empty blobs skip the temp file
    if (size === 0) {
      const handle = await open(blobPath, "w", 0o644);
      await handle.close();
      return;
    }

    await writeAtomic(blobPath, body, size);
  };

  const put = async (
    actionId: string,
    outputId: string,
    size: number,
    body: Readable
  ): Promise<string> => {
    assertOpen("put");
    counters.countPut();
    log.debug("put", { actionID: actionId, outputID: outputId, size });

    const blobPath = join(basePath, toBlobFileName(outputId));
    const startedAt = performance.now();

    try {
      await writeBlob(blobPath, size, body);

      const entry = encodeIndexEntry(outputId, size, BigInt(Date.now()) * 1_000_000n);
      await writeAtomic(join(basePath, toIndexFileName(actionId)), new TextEncoder().encode(entry));
    } catch (error) {
      counters.countPutError();
      throw error;
    }

    counters.addPutTransfer(size, performance.now() - startedAt);
    return blobPath;
  };

  const close = async (): Promise<void> => {
    assertOpen("close");
    closed = true;
    log.debug("close");
  };

  return { get, put, close, counters };
};
