/**
 * Leveled, grouped logger
 *
 * Lines look like:
 *
 *   D disk: put {actionID="01ab" outputID="9f" size=3}
 *
 * Output goes to stderr by default; stdout belongs to the cache protocol.
 */

import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from "chalk";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type Logger = {
  trace: (message: string, fields?: LogFields) => void;
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  /** Whether messages at this level are written */
  enabled: (level: LogLevel) => boolean;
  /** Logger whose lines carry an additional group segment */
  child: (group: string) => Logger;
};

export type LoggerOptions = {
  /** Minimum level written (default: "error") */
  level?: LogLevel;
  /** Line sink (default: console.error) */
  write?: (line: string) => void;
  /** Color the level tag (default: whatever chalk detected for the terminal) */
  color?: boolean;
  groups?: string[];
};

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error"];

const levelColor = (c: ChalkInstance, level: LogLevel): ((text: string) => string) => {
  switch (level) {
    case "trace":
      return c.gray;
    case "debug":
      return c.cyan;
    case "info":
      return c.blue;
    case "warn":
      return c.yellow;
    case "error":
      return c.red;
  }
};

const formatValue = (value: unknown): string => {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return value.toString();
  return JSON.stringify(value) ?? String(value);
};

export const formatFields = (fields: LogFields): string => {
  const parts = Object.entries(fields).map(([key, value]) => `${key}=${formatValue(value)}`);
  return parts.length > 0 ? ` {${parts.join(" ")}}` : "";
};

/**
 * Create a logger
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "error");
  const write = options.write ?? ((line: string) => console.error(line));
  const color = options.color ?? chalk.level > 0;
  const colorLevel: ColorSupportLevel = color ? (chalk.level === 0 ? 1 : chalk.level) : 0;
  const c = new Chalk({ level: colorLevel });
  const groups = options.groups ?? [];

  const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

  const log = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (!enabled(level)) return;
    let line = levelColor(c, level)(level.charAt(0).toUpperCase());
    if (groups.length > 0) {
      line += ` ${c.bold(groups.join("."))}:`;
    }
    line += ` ${message}`;
    if (fields) {
      line += formatFields(fields);
    }
    write(line);
  };

  return {
    trace: (message, fields) => log("trace", message, fields),
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields),
    enabled,
    child: (group) => createLogger({ ...options, groups: [...groups, group] }),
  };
};

/**
 * Map a numeric verbosity (0 = error … 4 = trace) to a level
 */
export const levelFromVerbosity = (verbosity: number): LogLevel => {
  const index = LOG_LEVELS.length - 1 - Math.min(Math.max(Math.trunc(verbosity), 0), 4);
  return LOG_LEVELS[index] ?? "error";
};
