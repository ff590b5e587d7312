/**
 * Atomic file writes: copy into a temp file beside the destination, then
 * rename it over the destination. Readers see either the old file or the
 * complete new one.
 */

import { randomBytes } from "node:crypto";
import { createWriteStream, type WriteStream } from "node:fs";
import { rm, rename } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { CacheError } from "@tiercache/storage-core";

/**
 * Temp file path in the same directory as `dest`, so the rename never
 * crosses a filesystem boundary.
 */
export const tempPathFor = (dest: string): string => {
  return join(dirname(dest), `${basename(dest)}.${randomBytes(6).toString("hex")}`);
};

const whenClosed = (stream: WriteStream): Promise<void> => {
  return new Promise((resolve) => {
    if (stream.closed) {
      resolve();
    } else {
      stream.once("close", () => resolve());
    }
  });
};

/**
 * Stream `body` into `dest` atomically. With `expectedSize`, a body of any
 * other length is discarded and `dest` is left untouched.
 *
 * @returns Number of bytes written
 */
export const writeAtomic = async (
  dest: string,
  body: Readable | Uint8Array,
  expectedSize?: number
): Promise<number> => {
  const tempPath = tempPathFor(dest);
  const out = createWriteStream(tempPath, { flags: "wx", mode: 0o644 });

  try {
    await pipeline(body instanceof Uint8Array ? Readable.from([body]) : body, out);
    if (expectedSize !== undefined && out.bytesWritten !== expectedSize) {
      throw new CacheError(
        "SizeMismatch",
        `wrote ${out.bytesWritten} bytes, expected ${expectedSize}`
      );
    }
    await rename(tempPath, dest);
  } catch (error) {
    out.destroy();
    await whenClosed(out);
    await rm(tempPath, { force: true });
    throw error;
  }

  return out.bytesWritten;
};
