import { writeFile } from "node:fs/promises";
import type { Readable, Writable } from "node:stream";
import { startTieredCache, type TieredCacheStats } from "@tiercache/storage-cached";
import {
  createLogger,
  errorMessage,
  formatCsv,
  formatSeconds,
  formatSummary,
  type Logger,
  levelFromVerbosity,
} from "@tiercache/storage-core";
import { startFsStorage } from "@tiercache/storage-fs";
import { createS3Storage, type S3ObjectClient } from "@tiercache/storage-s3";
import { createCacheProcess } from "@tiercache/protocol";
import type { HelperConfig } from "./config";

export interface HelperIO {
  input: Readable;
  output: Writable;
  /** Where summaries go (default: console.error) */
  report?: (text: string) => void;
  /** S3 client override, for tests */
  s3Client?: S3ObjectClient;
  logger?: Logger;
  /** Aborting drops replication work still queued */
  signal?: AbortSignal;
}

export interface HelperResult {
  stats: TieredCacheStats;
  elapsedMs: number;
}

/**
 * Human-readable end-of-run report
 */
export function formatReport(result: HelperResult): string {
  return [
    "disk stats:",
    formatSummary(result.stats.local),
    "s3 stats:",
    formatSummary(result.stats.remote),
    `total time: ${formatSeconds(result.elapsedMs)}`,
  ].join("\n");
}

async function writeMetricsCsv(file: string, result: HelperResult, log: Logger): Promise<void> {
  try {
    await writeFile(file, formatCsv(result.stats.remote, { header: true }), "utf-8");
  } catch (error) {
    log.error("writing metrics csv", { path: file, err: errorMessage(error) });
  }
}

/**
 * Serve cache requests on `io.input`/`io.output` until the toolchain closes
 * the session, then report.
 */
export async function runHelper(config: HelperConfig, io: HelperIO): Promise<HelperResult> {
  const startedAt = performance.now();
  const logger = io.logger ?? createLogger({ level: levelFromVerbosity(config.verbosity) });
  const log = logger.child("main");

  const remote = createS3Storage({
    bucket: config.bucket,
    prefix: config.s3Prefix,
    region: config.region,
    client: io.s3Client,
    logger,
  });

  log.debug("starting cache", {
    dir: config.localCacheDir,
    bucket: config.bucket,
    prefix: config.s3Prefix,
  });
  const cache = await startTieredCache(
    {
      local: () => startFsStorage({ basePath: config.localCacheDir, logger }),
      remote,
      queueLength: config.queueLen,
      workers: config.workers,
      logger,
    },
    io.signal
  );

  const proc = createCacheProcess(cache, { input: io.input, output: io.output, logger });
  await proc.run();

  const result: HelperResult = { stats: cache.stats(), elapsedMs: performance.now() - startedAt };
  if (logger.enabled("info")) {
    const report = io.report ?? ((text: string) => console.error(text));
    report(formatReport(result));
  }
  if (config.metricsCsv) {
    await writeMetricsCsv(config.metricsCsv, result, log);
  }
  return result;
}
