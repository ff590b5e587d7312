/**
 * Tiered Cache Memory Storage
 *
 * In-memory S3 stand-in for tests and local development.
 */

export {
  createMemoryS3Client,
  type MemoryS3Client,
  type MemoryS3ClientConfig,
  type MemoryS3Hooks,
  type StoredObject,
} from "./memory-s3-client.ts";
