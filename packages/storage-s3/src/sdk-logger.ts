import { inspect } from "node:util";
import type { Logger } from "@tiercache/storage-core";

/** Logger shape the AWS SDK clients accept */
export type SdkLogger = {
  trace: (...content: unknown[]) => void;
  debug: (...content: unknown[]) => void;
  info: (...content: unknown[]) => void;
  warn: (...content: unknown[]) => void;
  error: (...content: unknown[]) => void;
};

const formatContent = (content: unknown): string =>
  typeof content === "string" ? content : inspect(content, { depth: 2, breakLength: Infinity });

/**
 * Route AWS SDK client logging to `log` at trace level, whatever level the
 * SDK logs at. Undefined unless trace is enabled, which leaves the SDK on
 * its silent default.
 */
export const createSdkLogger = (log: Logger): SdkLogger | undefined => {
  if (!log.enabled("trace")) {
    return undefined;
  }
  const write = (...content: unknown[]): void => {
    log.trace("aws sdk", { detail: content.map(formatContent).join(" ") });
  };
  return { trace: write, debug: write, info: write, warn: write, error: write };
};
