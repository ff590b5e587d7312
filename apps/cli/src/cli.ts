import { Command, CommanderError } from "commander";
import { type CliOptions, DEFAULT_S3_PREFIX, getDefaultLocalCacheDir, resolveConfig } from "./lib/config";
import { runHelper } from "./lib/helper";

const program = new Command();

program
  .name("tiercache")
  .description("Go build cache helper (GOCACHEPROG) backed by a local directory and S3")
  .version("0.1.0")
  .option("-v, --verbose <level>", "log verbosity: 0 errors, 1 warnings, 2 info, 3 debug, 4 trace (default: 0)")
  .option("--bucket <name>", "S3 bucket (default: $TIERCACHE_BUCKET)")
  .option("--s3-prefix <prefix>", `key prefix for objects in the bucket (default: "${DEFAULT_S3_PREFIX}")`)
  .option("--local-cache-dir <dir>", `local cache directory (default: "${getDefaultLocalCacheDir()}")`)
  .option("--queue-len <n>", "replication work items buffered before puts wait (default: 0)")
  .option("--workers <n>", "replication workers (default: 1)")
  .option("--region <region>", "AWS region of the bucket")
  .option("--metrics-csv <file>", "write S3 counters as CSV to this file on exit")
  .action(async (options: CliOptions) => {
    const config = resolveConfig(options);
    const controller = new AbortController();
    const abort = () => controller.abort();
    process.once("SIGINT", abort);
    process.once("SIGTERM", abort);
    try {
      await runHelper(config, {
        input: process.stdin,
        output: process.stdout,
        signal: controller.signal,
      });
    } finally {
      process.off("SIGINT", abort);
      process.off("SIGTERM", abort);
      // The toolchain may hold stdin open after its close request
      process.stdin.destroy();
    }
  });

program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      process.exit(error.exitCode);
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

void main();
