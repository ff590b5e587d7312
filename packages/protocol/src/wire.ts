/**
 * Cache helper wire schemas
 *
 * The Go toolchain talks to a cache helper (GOCACHEPROG) with one JSON
 * object per line on the helper's stdin/stdout. Byte fields are base64
 * strings. A "put" with a non-zero BodySize is followed by one more line: the
 * body as a base64 JSON string.
 */

import { z } from "zod";

// ============================================================================
// Commands
// ============================================================================

export const CommandSchema = z.enum(["get", "put", "close"]);

export type Command = z.infer<typeof CommandSchema>;

export const KNOWN_COMMANDS: readonly Command[] = CommandSchema.options;

// ============================================================================
// Request
// ============================================================================

const Base64Schema = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, "Invalid base64");

/**
 * Request sent by the toolchain.
 *
 * `Command` stays a plain string here so that commands this helper does not
 * know are answered with an error instead of failing the whole stream.
 */
export const RequestSchema = z.object({
  /** Unique per process; echoed in the response */
  ID: z.number().int(),
  Command: z.string(),
  /** Cache key for get and put */
  ActionID: Base64Schema.optional(),
  /** Stored with the body for put */
  OutputID: Base64Schema.optional(),
  /** Older toolchains name OutputID this way */
  ObjectID: Base64Schema.optional(),
  /** Bytes of body following the request line; 0 or absent means none */
  BodySize: z.number().int().nonnegative().optional(),
});

export type Request = z.infer<typeof RequestSchema>;

export const BodySchema = Base64Schema;

// ============================================================================
// Response
// ============================================================================

export type Response = {
  ID: number;
  /** Non-empty on failure */
  Err?: string;
  /** Sent once, in the ID 0 message written at startup */
  KnownCommands?: Command[];
  Miss?: boolean;
  /** base64 */
  OutputID?: string;
  Size?: number;
  /** RFC 3339 time the object was put in the cache */
  Time?: string;
  /** Absolute path of the body on disk, for get hits and puts */
  DiskPath?: string;
};

/**
 * Serialize a response as one line, dropping empty fields.
 */
export const encodeResponse = (response: Response): string => {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(response)) {
    if (value === undefined || value === "" || value === false || value === 0) {
      if (key !== "ID") continue;
    }
    if (Array.isArray(value) && value.length === 0) continue;
    out[key] = value;
  }
  return `${JSON.stringify(out)}\n`;
};

/**
 * Parse one request line.
 *
 * @throws SyntaxError on invalid JSON, ZodError on an invalid request
 */
export const decodeRequest = (line: string): Request => {
  return RequestSchema.parse(JSON.parse(line));
};

/**
 * Parse the body line that follows a put request.
 */
export const decodeBody = (line: string): Uint8Array => {
  const encoded = BodySchema.parse(JSON.parse(line));
  return new Uint8Array(Buffer.from(encoded, "base64"));
};
