import { createLogger } from "@tiercache/storage-core";
import { describe, expect, it } from "vitest";
import { createSdkLogger } from "../src/sdk-logger.ts";

describe("createSdkLogger", () => {
  const capture = (level: "trace" | "debug") => {
    const lines: string[] = [];
    const log = createLogger({
      level,
      color: false,
      write: (line) => {
        lines.push(line);
      },
    });
    return { lines, log };
  };

  it("is absent below trace level", () => {
    const { log } = capture("debug");
    expect(createSdkLogger(log)).toBeUndefined();
  });

  it("writes every SDK level at trace", () => {
    const { lines, log } = capture("trace");
    const sdkLogger = createSdkLogger(log);

    sdkLogger?.info("endpoint resolved", { region: "us-east-1" });
    sdkLogger?.error("request failed");

    expect(lines).toEqual([
      `T aws sdk {detail="endpoint resolved { region: 'us-east-1' }"}`,
      'T aws sdk {detail="request failed"}',
    ]);
  });

  it("keeps the logger's group", () => {
    const { lines, log } = capture("trace");

    createSdkLogger(log.child("s3"))?.debug(42);

    expect(lines).toEqual(['T s3: aws sdk {detail="42"}']);
  });
});
