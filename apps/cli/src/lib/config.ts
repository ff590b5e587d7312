import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";

export const DEFAULT_S3_PREFIX = "go-cache";

/** Options as commander hands them over; every value is optional */
export interface CliOptions {
  verbose?: string;
  bucket?: string;
  s3Prefix?: string;
  localCacheDir?: string;
  queueLen?: string;
  workers?: string;
  region?: string;
  metricsCsv?: string;
}

const HelperConfigSchema = z.object({
  bucket: z.string().min(1, "neither --bucket nor TIERCACHE_BUCKET environment variable set"),
  s3Prefix: z.string().min(1),
  localCacheDir: z.string().min(1),
  queueLen: z.coerce.number().int().nonnegative(),
  workers: z.coerce.number().int().min(1),
  region: z.string().min(1).optional(),
  metricsCsv: z.string().min(1).optional(),
  verbosity: z.coerce.number().int().min(0).max(4),
});

export type HelperConfig = z.infer<typeof HelperConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Per-user cache directory, following each platform's convention
 */
export function getUserCacheDir(env: Env = process.env, platform = process.platform): string {
  if (platform === "win32") {
    return env.LOCALAPPDATA || path.join(os.homedir(), "AppData", "Local");
  }
  if (platform === "darwin") {
    return path.join(os.homedir(), "Library", "Caches");
  }
  return env.XDG_CACHE_HOME || path.join(os.homedir(), ".cache");
}

export function getDefaultLocalCacheDir(env: Env = process.env): string {
  return path.join(getUserCacheDir(env), "tiercache");
}

/**
 * Settings from TIERCACHE_* environment variables
 */
export function loadEnvConfig(env: Env = process.env): CliOptions {
  const blankToUndefined = (value: string | undefined) => (value ? value : undefined);
  return {
    verbose: blankToUndefined(env.TIERCACHE_VERBOSE),
    bucket: blankToUndefined(env.TIERCACHE_BUCKET),
    s3Prefix: blankToUndefined(env.TIERCACHE_S3_PREFIX),
    localCacheDir: blankToUndefined(env.TIERCACHE_LOCAL_CACHE_DIR),
    queueLen: blankToUndefined(env.TIERCACHE_QUEUE_LEN),
    workers: blankToUndefined(env.TIERCACHE_WORKERS),
    region: blankToUndefined(env.TIERCACHE_REGION),
    metricsCsv: blankToUndefined(env.TIERCACHE_METRICS_CSV),
  };
}

/**
 * Merge command-line options over the environment over defaults, and
 * validate the result.
 *
 * @throws Error listing every invalid setting
 */
export function resolveConfig(options: CliOptions, env: Env = process.env): HelperConfig {
  const fromEnv = loadEnvConfig(env);
  const result = HelperConfigSchema.safeParse({
    bucket: options.bucket ?? fromEnv.bucket ?? "",
    s3Prefix: options.s3Prefix ?? fromEnv.s3Prefix ?? DEFAULT_S3_PREFIX,
    localCacheDir: path.resolve(
      options.localCacheDir ?? fromEnv.localCacheDir ?? getDefaultLocalCacheDir(env)
    ),
    queueLen: options.queueLen ?? fromEnv.queueLen ?? 0,
    workers: options.workers ?? fromEnv.workers ?? 1,
    region: options.region ?? fromEnv.region,
    metricsCsv: options.metricsCsv ?? fromEnv.metricsCsv,
    verbosity: options.verbose ?? fromEnv.verbose ?? 0,
  });
  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.path[0] === "bucket" ? issue.message : `${issue.path.join(".")}: ${issue.message}`
    );
    throw new Error(problems.join("; "));
  }
  return result.data;
}
