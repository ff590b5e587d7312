/**
 * Tiered cache. Composes the local disk tier with a remote mirror.
 *
 * Read path (read-through):
 *   local.get → hit? return : remote.get → hit? local.put (backfill) → return
 *
 * Write path (write-behind):
 *   local.put → enqueue work item → return
 *   workers: dequeue → open local blob → remote.put
 *
 * The disk tier is authoritative. Remote replication is best effort: a work
 * item is attempted once by one worker and dropped on failure, and nothing
 * orders remote writes relative to each other. A local entry whose upload was
 * dropped never reaches the remote through this path.
 *
 * @packageDocumentation
 */

import { open } from "node:fs/promises";
import { Readable } from "node:stream";
import {
  CacheError,
  type ContentStore,
  type ContentStoreStarter,
  type CounterSnapshot,
  createLogger,
  errorMessage,
  isCacheError,
  type LocalEntry,
  type Logger,
  type RemoteMirror,
  type RemoteObject,
} from "@tiercache/storage-core";
import { WorkQueue } from "./work-queue.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * A queued replication task
 */
export type WorkItem = {
  actionId: string;
  outputId: string;
  size: number;
  /** Path of the blob in the local tier */
  diskPath: string;
};

export type TieredCacheConfig = {
  /** Starts the local, authoritative tier */
  local: ContentStoreStarter;
  /** Remote tier written behind and read through */
  remote: RemoteMirror;
  /** Work items buffered before `put` waits (0 = hand off to a worker) */
  queueLength?: number;
  /** Replication workers (at least 1) */
  workers?: number;
  logger?: Logger;
};

export type TieredCacheStats = {
  local: CounterSnapshot;
  remote: CounterSnapshot;
};

/**
 * A started tiered cache. Calls after `close` reject with `Closed`.
 */
export type TieredCache = {
  /** null on a miss in both tiers */
  get: (actionId: string) => Promise<LocalEntry | null>;
  /** Resolves with the local blob path once the local write is durable */
  put: (actionId: string, outputId: string, size: number, body: Readable) => Promise<string>;
  /** Close the local tier and wait until every queued item has been replicated */
  close: () => Promise<void>;
  stats: () => TieredCacheStats;
};

// ============================================================================
// Constants
// ============================================================================

/** Action ID of the startup probe object */
export const PROBE_ACTION_ID = "_probe";

const DEFAULT_QUEUE_LENGTH = 0;
const DEFAULT_WORKERS = 1;

// ============================================================================
// Probe
// ============================================================================

/**
 * Write a known object to the reserved probe key and read it back.
 * Its body and output ID are the full object key.
 */
const probeRemote = async (remote: RemoteMirror): Promise<void> => {
  const probeKey = `${remote.prefix}/${PROBE_ACTION_ID}`;
  const probeBytes = new TextEncoder().encode(probeKey);

  try {
    await remote.put(PROBE_ACTION_ID, probeKey, probeBytes.length, Readable.from([probeBytes]));
  } catch (error) {
    throw new CacheError("ProbeFailed", `s3 cache probe put failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let found: RemoteObject | null;
  try {
    found = await remote.get(PROBE_ACTION_ID);
  } catch (error) {
    throw new CacheError("ProbeFailed", `s3 cache probe get failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  if (!found) {
    throw new CacheError("ProbeFailed", "s3 cache probe get failed: probe object not found");
  }
  found.body.resume();
  if (found.size !== probeBytes.length) {
    throw new CacheError(
      "ProbeFailed",
      `s3 cache probe get size mismatch: expected ${probeBytes.length}, got ${found.size}`
    );
  }
};

// ============================================================================
// Factory
// ============================================================================

/**
 * Start a tiered cache: start the local tier, probe the remote tier, then
 * start the replication workers. The cache handle only exists once all
 * three succeed. Aborting `signal` stops the workers and drops queued
 * replication work.
 */
export const startTieredCache = async (
  config: TieredCacheConfig,
  signal?: AbortSignal
): Promise<TieredCache> => {
  const { remote } = config;
  const queueLength = config.queueLength ?? DEFAULT_QUEUE_LENGTH;
  const workers = config.workers ?? DEFAULT_WORKERS;
  const log = (config.logger ?? createLogger()).child("tiered");

  if (!Number.isInteger(workers) || workers < 1) {
    throw new CacheError("InvalidConfig", `workers must be at least 1, got ${workers}`);
  }

  let local: ContentStore;
  try {
    local = await config.local();
  } catch (error) {
    throw new CacheError("StartFailed", `local cache start failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  log.debug("probing s3 cache");
  try {
    await probeRemote(remote);
  } catch (error) {
    await local.close();
    throw error;
  }
  log.debug("probe success");

  const queue = new WorkQueue<WorkItem>(queueLength);
  let closed = false;
  let cancelled = false;

  const assertOpen = (op: string): void => {
    if (closed) {
      throw new CacheError("Closed", `tiered cache ${op} called after close`);
    }
  };

  // --------------------------------------------------------------------------
  // Workers
  // --------------------------------------------------------------------------

  const replicate = async (work: WorkItem): Promise<void> => {
    log.debug("s3 put", { ...work });

    if (work.size === 0) {
      await remote.put(work.actionId, work.outputId, 0, Readable.from([]));
      return;
    }

    const handle = await open(work.diskPath, "r").catch((error: unknown) => {
      log.error("opening file for s3 put", { path: work.diskPath, err: error });
      return null;
    });
    if (!handle) return;

    try {
      await remote.put(
        work.actionId,
        work.outputId,
        work.size,
        handle.createReadStream({ autoClose: false })
      );
    } finally {
      await handle.close();
    }
  };

  const runWorker = async (id: number): Promise<void> => {
    for (;;) {
      const work = await queue.dequeue();
      if (work === undefined) {
        log.debug(signal?.aborted ? "s3 worker stopped by cancellation" : "s3 worker done", {
          worker: id,
        });
        return;
      }
      try {
        await replicate(work);
      } catch (error) {
        // Counted by the mirror; the item is dropped
        log.warn("putting to s3", { actionID: work.actionId, outputID: work.outputId, err: error });
      }
      if (signal?.aborted) {
        log.debug("s3 worker stopped by cancellation", { worker: id });
        return;
      }
    }
  };

  const onAbort = (): void => {
    cancelled = true;
    const dropped = queue.cancel();
    log.warn("replication cancelled", { dropped });
  };

  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }
  const workerRuns = Array.from({ length: workers }, (_, i) => runWorker(i));

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  const get = async (actionId: string): Promise<LocalEntry | null> => {
    assertOpen("get");
    log.debug("get", { actionID: actionId });

    try {
      const hit = await local.get(actionId);
      if (hit) return hit;
    } catch (error) {
      log.warn("local get failed, trying s3", { actionID: actionId, err: error });
    }

    const found = await remote.get(actionId);
    if (!found) return null;

    // A get can write to the local tier
    const diskPath = await local.put(actionId, found.outputId, found.size, found.body);
    return { outputId: found.outputId, diskPath };
  };

  const put = async (
    actionId: string,
    outputId: string,
    size: number,
    body: Readable
  ): Promise<string> => {
    assertOpen("put");
    log.debug("put", { actionID: actionId, outputID: outputId, size });

    let diskPath: string;
    try {
      diskPath = await local.put(actionId, outputId, size, size === 0 ? Readable.from([]) : body);
    } catch (error) {
      throw new CacheError("LocalPutFailed", `local cache put failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (cancelled) {
      log.debug("replication cancelled, not queueing", { actionID: actionId });
      return diskPath;
    }

    try {
      const accepted = await queue.enqueue({ actionId, outputId, size, diskPath });
      if (!accepted) {
        log.debug("work item dropped by cancellation", { actionID: actionId });
      }
    } catch (error) {
      if (!isCacheError(error, "QueueClosed")) throw error;
      // Close ran while the local write was in flight
      log.warn("cache closed before queueing, not replicating", { actionID: actionId });
    }
    return diskPath;
  };

  const close = async (): Promise<void> => {
    assertOpen("close");
    closed = true;
    log.debug("close");

    let closeError: unknown = null;
    try {
      await local.close();
    } catch (error) {
      closeError = error;
    }

    queue.close();
    log.debug("waiting for s3 workers to finish");
    await Promise.all(workerRuns);
    signal?.removeEventListener("abort", onAbort);

    if (closeError !== null) {
      throw new CacheError("CloseFailed", `local cache stop failed: ${errorMessage(closeError)}`, {
        cause: closeError,
      });
    }
  };

  const stats = (): TieredCacheStats => ({
    local: local.counters.snapshot(),
    remote: remote.counters.snapshot(),
  });

  return { get, put, close, stats };
};
