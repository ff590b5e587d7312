/**
 * Request loop over in-process streams with disk-backed fake handlers
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createInterface } from "node:readline";
import { PassThrough, type Readable } from "node:stream";
import { createLogger, type LocalEntry } from "@tiercache/storage-core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type CacheHandlers, createCacheProcess } from "../src/process.ts";

// 0x01ab, 0x9f00 and "hello" in base64
const ACTION_B64 = "Aas=";
const OUTPUT_B64 = "nwA=";
const HELLO_B64 = "aGVsbG8=";

const readBytes = async (body: Readable): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
};

type FakeHandlers = CacheHandlers & {
  entries: Map<string, LocalEntry>;
  closed: number;
};

const createFakeHandlers = (dir: string): FakeHandlers => {
  const entries = new Map<string, LocalEntry>();
  const fake: FakeHandlers = {
    entries,
    closed: 0,
    get: async (actionId) => entries.get(actionId) ?? null,
    put: async (actionId, outputId, _size, body) => {
      const diskPath = join(dir, `o-${outputId}`);
      await writeFile(diskPath, await readBytes(body));
      entries.set(actionId, { outputId, diskPath });
      return diskPath;
    },
    close: async () => {
      fake.closed++;
    },
  };
  return fake;
};

const startProcess = (handlers: CacheHandlers) => {
  const input = new PassThrough();
  const output = new PassThrough();
  const proc = createCacheProcess(handlers, {
    input,
    output,
    logger: createLogger({ write: () => {} }),
  });
  const done = proc.run();
  const lines = createInterface({ input: output })[Symbol.asyncIterator]();

  const next = async (): Promise<unknown> => {
    const line = await lines.next();
    if (line.done) {
      throw new Error("output ended");
    }
    return JSON.parse(line.value);
  };
  const send = (...requestLines: string[]): void => {
    for (const line of requestLines) {
      input.write(`${line}\n`);
    }
  };

  return { proc, done, next, send, input };
};

describe("createCacheProcess", () => {
  let dir: string;
  let handlers: FakeHandlers;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tiercache-proc-"));
    handlers = createFakeHandlers(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("announces its commands first", async () => {
    const { next, send, done } = startProcess(handlers);

    expect(await next()).toEqual({ ID: 0, KnownCommands: ["get", "put", "close"] });

    send('{"ID":1,"Command":"close"}');
    expect(await next()).toEqual({ ID: 1 });
    await done;
    expect(handlers.closed).toBe(1);
  });

  it("puts, gets and misses", async () => {
    const { next, send, done, proc } = startProcess(handlers);
    await next();

    send(
      `{"ID":1,"Command":"put","ActionID":"${ACTION_B64}","OutputID":"${OUTPUT_B64}","BodySize":5}`,
      `"${HELLO_B64}"`
    );
    const diskPath = join(dir, "o-9f00");
    expect(await next()).toEqual({ ID: 1, DiskPath: diskPath });
    expect(handlers.entries.get("01ab")).toEqual({ outputId: "9f00", diskPath });

    send(`{"ID":2,"Command":"get","ActionID":"${ACTION_B64}"}`);
    const hit = await next();
    expect(hit).toMatchObject({ ID: 2, OutputID: OUTPUT_B64, Size: 5, DiskPath: diskPath });
    expect(hit).toHaveProperty("Time", expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/));

    send('{"ID":3,"Command":"get","ActionID":"qrs="}');
    expect(await next()).toEqual({ ID: 3, Miss: true });

    send('{"ID":4,"Command":"close"}');
    expect(await next()).toEqual({ ID: 4 });
    await done;

    expect(proc.stats()).toEqual({ gets: 2, getHits: 1, puts: 1 });
  });

  it("reads no body line for an empty put", async () => {
    const { next, send, done } = startProcess(handlers);
    await next();

    send(`{"ID":1,"Command":"put","ActionID":"${ACTION_B64}","ObjectID":"${OUTPUT_B64}"}`);
    expect(await next()).toEqual({ ID: 1, DiskPath: join(dir, "o-9f00") });

    send('{"ID":2,"Command":"close"}');
    expect(await next()).toEqual({ ID: 2 });
    await done;
  });

  it("answers bad requests with an error and keeps going", async () => {
    const { next, send, done } = startProcess(handlers);
    await next();

    send(
      `{"ID":1,"Command":"put","ActionID":"${ACTION_B64}","OutputID":"${OUTPUT_B64}","BodySize":3}`,
      `"${HELLO_B64}"`
    );
    expect(await next()).toEqual({ ID: 1, Err: "only got 5 bytes of declared 3" });
    expect(handlers.entries.size).toBe(0);

    send('{"ID":2,"Command":"stat"}');
    expect(await next()).toEqual({ ID: 2, Err: 'unknown command "stat"' });

    send('{"ID":3,"Command":"get"}');
    expect(await next()).toEqual({ ID: 3, Err: "get request without ActionID" });

    send(`{"ID":4,"Command":"put","ActionID":"${ACTION_B64}"}`);
    expect(await next()).toEqual({ ID: 4, Err: "put request without ActionID or OutputID" });

    send('{"ID":5,"Command":"close"}');
    expect(await next()).toEqual({ ID: 5 });
    await done;
  });

  it("reports handler failures in the response", async () => {
    const failing: CacheHandlers = {
      ...handlers,
      get: async () => {
        throw new Error("unexpected S3 get for go-cache/01ab");
      },
    };
    const { next, send, done } = startProcess(failing);
    await next();

    send(`{"ID":1,"Command":"get","ActionID":"${ACTION_B64}"}`);
    expect(await next()).toEqual({ ID: 1, Err: "unexpected S3 get for go-cache/01ab" });

    send('{"ID":2,"Command":"close"}');
    await next();
    await done;
  });

  it("misses when the entry's file is gone", async () => {
    handlers.entries.set("01ab", { outputId: "9f00", diskPath: join(dir, "o-9f00") });
    const { next, send, done } = startProcess(handlers);
    await next();

    send(`{"ID":1,"Command":"get","ActionID":"${ACTION_B64}"}`);
    expect(await next()).toEqual({ ID: 1, Miss: true });

    send('{"ID":2,"Command":"close"}');
    await next();
    await done;
  });

  it("reports close failures", async () => {
    const failing: CacheHandlers = {
      ...handlers,
      close: async () => {
        throw new Error("local cache stop failed: EIO");
      },
    };
    const { next, send, done } = startProcess(failing);
    await next();

    send('{"ID":1,"Command":"close"}');
    expect(await next()).toEqual({ ID: 1, Err: "local cache stop failed: EIO" });
    await done;
  });

  it("closes the cache at end of input", async () => {
    const { next, input, done } = startProcess(handlers);
    await next();

    input.end();
    await done;
    expect(handlers.closed).toBe(1);
  });

  it("stops on an undecodable request", async () => {
    const { next, send, done } = startProcess(handlers);
    await next();

    send("this is not json");
    await expect(done).rejects.toMatchObject({ code: "ProtocolError" });
  });
});
