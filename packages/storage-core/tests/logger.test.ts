import { describe, expect, it } from "vitest";
import { CacheError, errorMessage, isCacheError } from "../src/errors.ts";
import {
  createLogger,
  formatFields,
  type LoggerOptions,
  levelFromVerbosity,
} from "../src/logger.ts";

const capture = (options: LoggerOptions) => {
  const lines: string[] = [];
  const logger = createLogger({
    ...options,
    color: false,
    write: (line) => {
      lines.push(line);
    },
  });
  return { lines, logger };
};

describe("createLogger", () => {
  it("writes level tag, group path, message and fields", () => {
    const { lines, logger } = capture({ level: "trace" });
    logger.child("disk").debug("put", { actionID: "01ab", size: 3 });
    logger.child("tiered").child("worker").info("done");
    expect(lines).toEqual(['D disk: put {actionID="01ab" size=3}', "I tiered.worker: done"]);
  });

  it("drops lines below the threshold", () => {
    const { lines, logger } = capture({ level: "warn" });
    logger.info("hidden");
    logger.debug("hidden");
    logger.warn("shown");
    logger.error("shown too");
    expect(lines).toEqual(["W shown", "E shown too"]);
    expect(logger.enabled("info")).toBe(false);
    expect(logger.enabled("error")).toBe(true);
  });

  it("defaults to errors only", () => {
    const { lines, logger } = capture({});
    logger.warn("hidden");
    logger.error("boom");
    expect(lines).toEqual(["E boom"]);
  });

  it("keeps the threshold in children", () => {
    const { lines, logger } = capture({ level: "error" });
    logger.child("s3").info("hidden");
    expect(lines).toEqual([]);
  });
});

describe("formatFields", () => {
  it("quotes strings and error messages", () => {
    expect(formatFields({ err: new Error("no such file"), path: "/tmp/x", ok: true })).toBe(
      ' {err="no such file" path="/tmp/x" ok=true}'
    );
    expect(formatFields({})).toBe("");
  });
});

describe("levelFromVerbosity", () => {
  it("maps 0..4 to error..trace and clamps", () => {
    expect(levelFromVerbosity(0)).toBe("error");
    expect(levelFromVerbosity(1)).toBe("warn");
    expect(levelFromVerbosity(2)).toBe("info");
    expect(levelFromVerbosity(3)).toBe("debug");
    expect(levelFromVerbosity(4)).toBe("trace");
    expect(levelFromVerbosity(9)).toBe("trace");
    expect(levelFromVerbosity(-1)).toBe("error");
  });
});

describe("CacheError", () => {
  it("carries a code and defaults the message to it", () => {
    const error = new CacheError("Closed");
    expect(error.message).toBe("Closed");
    expect(isCacheError(error)).toBe(true);
    expect(isCacheError(error, "Closed")).toBe(true);
    expect(isCacheError(error, "ProbeFailed")).toBe(false);
    expect(isCacheError(new Error("x"))).toBe(false);
  });

  it("keeps the cause", () => {
    const cause = new Error("disk full");
    const error = new CacheError("LocalPutFailed", "local cache put failed", { cause });
    expect(error.cause).toBe(cause);
    expect(errorMessage(error)).toBe("local cache put failed");
    expect(errorMessage("plain")).toBe("plain");
  });
});
