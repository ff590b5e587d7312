import type { Readable } from "node:stream";
import type { CacheCounters } from "./counters.ts";

/**
 * A local cache entry: the output ID stored for an action and the path of
 * its blob on disk.
 */
export type LocalEntry = {
  outputId: string;
  diskPath: string;
};

/**
 * An object read from the remote tier
 */
export type RemoteObject = {
  outputId: string;
  size: number;
  body: Readable;
};

/**
 * Local, authoritative disk tier
 *
 * A store only exists once started (see `ContentStoreStarter`). `get`
 * resolves null on a miss. `put` resolves once the blob and its index entry
 * are both on disk. Calls after `close` reject with `Closed`.
 */
export type ContentStore = {
  get: (actionId: string) => Promise<LocalEntry | null>;
  put: (actionId: string, outputId: string, size: number, body: Readable) => Promise<string>;
  close: () => Promise<void>;
  readonly counters: CacheCounters;
};

/** Prepares a disk tier and resolves it ready for use */
export type ContentStoreStarter = () => Promise<ContentStore>;

/**
 * Remote object-store tier
 *
 * `get` resolves null only when the backend says the object does not exist;
 * every other failure rejects.
 */
export type RemoteMirror = {
  /** Key prefix objects are stored under */
  readonly prefix: string;
  get: (actionId: string) => Promise<RemoteObject | null>;
  put: (actionId: string, outputId: string, size: number, body: Readable) => Promise<void>;
  readonly counters: CacheCounters;
};
