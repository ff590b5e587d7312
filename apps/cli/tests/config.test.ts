import * as os from "node:os";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { getDefaultLocalCacheDir, getUserCacheDir, resolveConfig } from "../src/lib/config";

describe("getUserCacheDir", () => {
  it("follows each platform's convention", () => {
    expect(getUserCacheDir({ XDG_CACHE_HOME: "/tmp/xdg" }, "linux")).toBe("/tmp/xdg");
    expect(getUserCacheDir({}, "linux")).toBe(path.join(os.homedir(), ".cache"));
    expect(getUserCacheDir({}, "darwin")).toBe(path.join(os.homedir(), "Library", "Caches"));
    expect(getUserCacheDir({ LOCALAPPDATA: "D:\\cache" }, "win32")).toBe("D:\\cache");
  });
});

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    const env = { TIERCACHE_BUCKET: "test-bucket", XDG_CACHE_HOME: "/tmp/xdg" };
    expect(resolveConfig({}, env)).toEqual({
      bucket: "test-bucket",
      s3Prefix: "go-cache",
      localCacheDir: path.resolve(getDefaultLocalCacheDir(env)),
      queueLen: 0,
      workers: 1,
      region: undefined,
      metricsCsv: undefined,
      verbosity: 0,
    });
  });

  it("prefers command-line options over the environment", () => {
    const config = resolveConfig(
      { bucket: "cli-bucket", workers: "4", localCacheDir: "/var/cache/tc" },
      {
        TIERCACHE_BUCKET: "env-bucket",
        TIERCACHE_WORKERS: "2",
        TIERCACHE_QUEUE_LEN: "8",
        TIERCACHE_REGION: "eu-west-1",
      }
    );
    expect(config).toMatchObject({
      bucket: "cli-bucket",
      workers: 4,
      queueLen: 8,
      region: "eu-west-1",
      localCacheDir: "/var/cache/tc",
    });
  });

  it("treats empty variables as unset", () => {
    const config = resolveConfig({ bucket: "b" }, { TIERCACHE_S3_PREFIX: "", TIERCACHE_WORKERS: "" });
    expect(config.s3Prefix).toBe("go-cache");
    expect(config.workers).toBe(1);
  });

  it("requires a bucket", () => {
    expect(() => resolveConfig({}, {})).toThrow(
      "neither --bucket nor TIERCACHE_BUCKET environment variable set"
    );
  });

  it("rejects invalid numbers", () => {
    expect(() => resolveConfig({ bucket: "b", workers: "0" }, {})).toThrow(/^workers: /);
    expect(() => resolveConfig({ bucket: "b", queueLen: "-1" }, {})).toThrow(/^queueLen: /);
    expect(() => resolveConfig({ bucket: "b", verbose: "loud" }, {})).toThrow(/^verbosity: /);
  });
});
