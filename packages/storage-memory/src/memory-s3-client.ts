/**
 * In-Memory S3 Client
 *
 * Stands in for the S3 service in tests and local development. Implements
 * the two object calls the S3 mirror makes, with S3's not-found error.
 */

import { Readable } from "node:stream";
import {
  type GetObjectCommandInput,
  type GetObjectCommandOutput,
  NoSuchKey,
  type PutObjectCommandInput,
  type PutObjectCommandOutput,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { sdkStreamMixin } from "@smithy/util-stream";
import type { S3ObjectClient } from "@tiercache/storage-s3";

export type StoredObject = {
  body: Uint8Array;
  metadata: Record<string, string>;
};

/**
 * Hooks run before each call. Throw to fail the call, or await to delay it.
 */
export type MemoryS3Hooks = {
  onGet?: (input: GetObjectCommandInput) => void | Promise<void>;
  onPut?: (input: PutObjectCommandInput) => void | Promise<void>;
};

export type MemoryS3ClientConfig = MemoryS3Hooks & {
  /** Optional initial objects, keyed by `bucket/key` */
  initialObjects?: Map<string, StoredObject>;
};

export type MemoryS3Client = S3ObjectClient & {
  /** Stored objects, keyed by `bucket/key` */
  objects: Map<string, StoredObject>;
  /** Keys of every call, in order */
  calls: Array<{ method: "getObject" | "putObject"; key: string }>;
};

const objectPath = (bucket: string | undefined, key: string | undefined): string => {
  return `${bucket ?? ""}/${key ?? ""}`;
};

const collectBody = async (body: PutObjectCommandInput["Body"]): Promise<Uint8Array> => {
  if (body === undefined) {
    return new Uint8Array(0);
  }
  if (typeof body === "string") {
    return new TextEncoder().encode(body);
  }
  if (body instanceof Uint8Array) {
    return new Uint8Array(body);
  }
  if (body instanceof Readable) {
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(Buffer.from(chunk));
    }
    return new Uint8Array(Buffer.concat(chunks));
  }
  throw new Error("unsupported body type for in-memory S3 client");
};

/**
 * Create an in-memory S3 object client
 */
export const createMemoryS3Client = (config: MemoryS3ClientConfig = {}): MemoryS3Client => {
  const objects = config.initialObjects ?? new Map<string, StoredObject>();
  const calls: MemoryS3Client["calls"] = [];

  const getObject = async (input: GetObjectCommandInput): Promise<GetObjectCommandOutput> => {
    calls.push({ method: "getObject", key: input.Key ?? "" });
    await config.onGet?.(input);

    const stored = objects.get(objectPath(input.Bucket, input.Key));
    if (!stored) {
      throw new NoSuchKey({ $metadata: { httpStatusCode: 404 }, message: "The specified key does not exist." });
    }
    return {
      $metadata: { httpStatusCode: 200 },
      Body: sdkStreamMixin(Readable.from([Buffer.from(stored.body)])),
      ContentLength: stored.body.length,
      Metadata: { ...stored.metadata },
    };
  };

  const putObject = async (input: PutObjectCommandInput): Promise<PutObjectCommandOutput> => {
    calls.push({ method: "putObject", key: input.Key ?? "" });
    await config.onPut?.(input);

    const body = await collectBody(input.Body);
    if (input.ContentLength !== undefined && input.ContentLength !== body.length) {
      throw new S3ServiceException({
        name: "IncompleteBody",
        $fault: "client",
        $metadata: { httpStatusCode: 400 },
        message: `got ${body.length} bytes, Content-Length was ${input.ContentLength}`,
      });
    }
    objects.set(objectPath(input.Bucket, input.Key), {
      body,
      metadata: { ...input.Metadata },
    });
    return { $metadata: { httpStatusCode: 200 } };
  };

  return { getObject, putObject, objects, calls };
};
