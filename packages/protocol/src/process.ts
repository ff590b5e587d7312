/**
 * Cache helper request loop
 *
 * Reads requests from `input`, dispatches them to the cache handlers and
 * writes responses to `output`. Requests are handled concurrently, so
 * responses can come back in a different order than their requests.
 */

import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import { createInterface } from "node:readline";
import { Readable, type Writable } from "node:stream";
import {
  bytesToHex,
  CacheError,
  createLogger,
  errorMessage,
  hexToBytes,
  isHexId,
  type LocalEntry,
  type Logger,
} from "@tiercache/storage-core";
import {
  decodeBody,
  decodeRequest,
  encodeResponse,
  KNOWN_COMMANDS,
  type Request,
  type Response,
} from "./wire.ts";

/**
 * What the loop needs from a cache: the get/put/close contract of the
 * tiered cache.
 */
export type CacheHandlers = {
  get: (actionId: string) => Promise<LocalEntry | null>;
  put: (actionId: string, outputId: string, size: number, body: Readable) => Promise<string>;
  close: () => Promise<void>;
};

export type CacheProcessOptions = {
  input: Readable;
  output: Writable;
  logger?: Logger;
};

export type CacheProcessStats = {
  gets: number;
  getHits: number;
  puts: number;
};

export type CacheProcess = {
  /** Resolves after a close request (or end of input) has been handled */
  run: () => Promise<void>;
  stats: () => CacheProcessStats;
};

const base64ToHex = (value: string): string => bytesToHex(Buffer.from(value, "base64"));

const hexToBase64 = (hex: string): string => Buffer.from(hexToBytes(hex)).toString("base64");

const isNotFound = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
};

/**
 * Create the request loop for a set of cache handlers
 */
export const createCacheProcess = (
  handlers: CacheHandlers,
  options: CacheProcessOptions
): CacheProcess => {
  const { input, output } = options;
  const log = (options.logger ?? createLogger()).child("proc");
  const counts: CacheProcessStats = { gets: 0, getHits: 0, puts: 0 };

  const send = (response: Response): void => {
    output.write(encodeResponse(response));
  };

  const handleGet = async (req: Request): Promise<Response> => {
    counts.gets++;
    if (!req.ActionID) {
      throw new CacheError("ProtocolError", "get request without ActionID");
    }

    const entry = await handlers.get(base64ToHex(req.ActionID));
    if (!entry) {
      return { ID: req.ID, Miss: true };
    }
    if (!isHexId(entry.outputId)) {
      throw new CacheError("ProtocolError", `invalid OutputID ${JSON.stringify(entry.outputId)}`);
    }

    let info: Stats;
    try {
      info = await stat(entry.diskPath);
    } catch (error) {
      if (isNotFound(error)) {
        return { ID: req.ID, Miss: true };
      }
      throw error;
    }
    if (!info.isFile()) {
      throw new CacheError("ProtocolError", `${entry.diskPath} is not a regular file`);
    }

    counts.getHits++;
    return {
      ID: req.ID,
      OutputID: hexToBase64(entry.outputId),
      Size: info.size,
      Time: info.mtime.toISOString(),
      DiskPath: entry.diskPath,
    };
  };

  const handlePut = async (req: Request, body: Uint8Array): Promise<Response> => {
    counts.puts++;
    const outputId = req.OutputID ?? req.ObjectID;
    if (!req.ActionID || !outputId) {
      throw new CacheError("ProtocolError", "put request without ActionID or OutputID");
    }

    const size = req.BodySize ?? 0;
    if (body.length !== size) {
      throw new CacheError("ProtocolError", `only got ${body.length} bytes of declared ${size}`);
    }

    const diskPath = await handlers.put(
      base64ToHex(req.ActionID),
      base64ToHex(outputId),
      size,
      Readable.from([body])
    );

    const info = await stat(diskPath);
    if (info.size !== size) {
      throw new CacheError(
        "ProtocolError",
        `failed to write file to disk with right size: disk=${info.size}; wanted=${size}`
      );
    }
    return { ID: req.ID, DiskPath: diskPath };
  };

  const handle = async (req: Request, body: Uint8Array): Promise<Response> => {
    try {
      switch (req.Command) {
        case "get":
          return await handleGet(req);
        case "put":
          return await handlePut(req, body);
        default:
          throw new CacheError("ProtocolError", `unknown command ${JSON.stringify(req.Command)}`);
      }
    } catch (error) {
      log.error("request failed", { id: req.ID, command: req.Command, err: error });
      return { ID: req.ID, Err: errorMessage(error) };
    }
  };

  const run = async (): Promise<void> => {
    send({ ID: 0, KnownCommands: [...KNOWN_COMMANDS] });

    const rl = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
    const lines = rl[Symbol.asyncIterator]();
    const inFlight = new Set<Promise<void>>();

    const nextLine = async (): Promise<string | null> => {
      for (;;) {
        const next = await lines.next();
        if (next.done) return null;
        if (next.value.trim() !== "") return next.value;
      }
    };

    const parse = <T>(what: string, fn: () => T): T => {
      try {
        return fn();
      } catch (error) {
        throw new CacheError("ProtocolError", `decoding ${what}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    };

    try {
      for (;;) {
        const line = await nextLine();
        if (line === null) {
          log.debug("end of input without close");
          await Promise.all(inFlight);
          await handlers.close();
          return;
        }

        const req = parse("request", () => decodeRequest(line));
        log.trace("request", { id: req.ID, command: req.Command, bodySize: req.BodySize ?? 0 });

        if (req.Command === "close") {
          await Promise.all(inFlight);
          let closeError: string | undefined;
          try {
            await handlers.close();
          } catch (error) {
            log.error("close failed", { err: error });
            closeError = errorMessage(error);
          }
          send({ ID: req.ID, Err: closeError });
          return;
        }

        let body: Uint8Array = new Uint8Array(0);
        if (req.Command === "put" && (req.BodySize ?? 0) > 0) {
          const bodyLine = await nextLine();
          if (bodyLine === null) {
            throw new CacheError("ProtocolError", `missing body for request ${req.ID}`);
          }
          body = parse("body", () => decodeBody(bodyLine));
        }

        const task: Promise<void> = handle(req, body).then((response) => {
          send(response);
          inFlight.delete(task);
        });
        inFlight.add(task);
      }
    } finally {
      rl.close();
    }
  };

  return { run, stats: () => ({ ...counts }) };
};
