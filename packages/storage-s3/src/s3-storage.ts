/**
 * S3 Remote Mirror
 *
 * Remote tier of the tiered cache. Objects live at `{prefix}/{actionId}`;
 * the body is the raw blob and the output ID travels as object metadata.
 * Nothing here retries.
 */

import { Readable } from "node:stream";
import {
  type GetObjectCommandInput,
  type GetObjectCommandOutput,
  type PutObjectCommandInput,
  type PutObjectCommandOutput,
  S3,
} from "@aws-sdk/client-s3";
import {
  CacheError,
  type CacheCounters,
  createCacheCounters,
  createLogger,
  type Logger,
  type RemoteMirror,
  type RemoteObject,
  toObjectKey,
} from "@tiercache/storage-core";
import { isNotFoundError } from "./s3-errors.ts";
import { createSdkLogger } from "./sdk-logger.ts";

/** Metadata key holding the output ID */
export const OUTPUT_ID_METADATA_KEY = "outputid";

/**
 * The two S3 calls the mirror makes. The SDK's aggregated `S3` client
 * satisfies this; tests pass an in-process fake.
 */
export type S3ObjectClient = {
  getObject: (input: GetObjectCommandInput) => Promise<GetObjectCommandOutput>;
  putObject: (input: PutObjectCommandInput) => Promise<PutObjectCommandOutput>;
};

/**
 * S3 Remote Mirror configuration
 */
export type S3StorageConfig = {
  /** S3 bucket name */
  bucket: string;
  /** Key prefix, without trailing slash (default: "go-cache") */
  prefix?: string;
  /** AWS region for the S3 bucket (e.g. "us-west-2") */
  region?: string;
  /** Optional S3 client (for testing or custom config) */
  client?: S3ObjectClient;
  logger?: Logger;
  counters?: CacheCounters;
};

export const DEFAULT_PREFIX = "go-cache";

type ResponseBody = NonNullable<GetObjectCommandOutput["Body"]>;

const toReadable = async (body: ResponseBody): Promise<Readable> => {
  if (body instanceof Readable) {
    return body;
  }
  return Readable.from([await body.transformToByteArray()]);
};

/**
 * Create an S3-backed remote mirror
 */
export const createS3Storage = (config: S3StorageConfig): RemoteMirror => {
  const log = (config.logger ?? createLogger()).child("s3");
  const sdkLogger = createSdkLogger(log);
  const client =
    config.client ??
    new S3({
      ...(config.region ? { region: config.region } : {}),
      ...(sdkLogger ? { logger: sdkLogger } : {}),
    });
  const bucket = config.bucket;
  const prefix = config.prefix ?? DEFAULT_PREFIX;
  const counters = config.counters ?? createCacheCounters();

  const put = async (
    actionId: string,
    outputId: string,
    size: number,
    body: Readable
  ): Promise<void> => {
    counters.countPut();
    const key = toObjectKey(prefix, actionId);
    log.debug("put", { key, outputID: outputId, size });

    const startedAt = performance.now();
    try {
      await client.putObject({
        Bucket: bucket,
        Key: key,
        Body: size === 0 ? new Uint8Array(0) : body,
        ContentLength: size,
        Metadata: { [OUTPUT_ID_METADATA_KEY]: outputId },
      });
    } catch (error) {
      counters.countPutError();
      throw error;
    }
    counters.addPutTransfer(size, performance.now() - startedAt);
  };

  const get = async (actionId: string): Promise<RemoteObject | null> => {
    counters.countGet();
    const key = toObjectKey(prefix, actionId);
    log.debug("get", { key });

    const startedAt = performance.now();
    let result: GetObjectCommandOutput;
    try {
      result = await client.getObject({ Bucket: bucket, Key: key });
    } catch (error) {
      if (isNotFoundError(error)) {
        counters.countMiss();
        return null;
      }
      counters.countGetError();
      throw new CacheError("RemoteGetFailed", `unexpected S3 get for ${key}`, { cause: error });
    }
    const ms = performance.now() - startedAt;

    const outputId = result.Metadata?.[OUTPUT_ID_METADATA_KEY];
    if (!outputId) {
      counters.countGetError();
      throw new CacheError("MissingOutputId", `outputid not found in metadata of ${key}`);
    }
    if (result.ContentLength === undefined || !result.Body) {
      counters.countGetError();
      throw new CacheError("RemoteGetFailed", `S3 get for ${key} returned no content`);
    }

    const size = result.ContentLength;
    if (ms > 0) {
      log.trace("throughput", { key, bytes: size, ms: Math.round(ms), bytesPerMs: Math.round(size / ms) });
    }
    counters.addGetTransfer(size, ms);
    counters.countHit();

    return { outputId, size, body: await toReadable(result.Body) };
  };

  return { prefix, get, put, counters };
};
