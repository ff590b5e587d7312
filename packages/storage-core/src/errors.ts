export type CacheErrorCode =
  | "InvalidConfig"
  | "StartFailed"
  | "SizeMismatch"
  | "LocalPutFailed"
  | "RemoteGetFailed"
  | "MissingOutputId"
  | "ProbeFailed"
  | "QueueClosed"
  | "CloseFailed"
  | "Closed"
  | "ProtocolError";

export class CacheError extends Error {
  readonly code: CacheErrorCode;

  constructor(code: CacheErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.name = "CacheError";
    this.code = code;
  }
}

export function isCacheError(x: unknown, code?: CacheErrorCode): x is CacheError {
  return x instanceof CacheError && (code === undefined || x.code === code);
}

/**
 * Message of an unknown thrown value, for log fields and wire responses
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
