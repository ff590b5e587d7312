/**
 * Tiered Cache S3 Storage
 *
 * S3 remote tier of the tiered cache.
 */

export { isNotFoundError } from "./s3-errors.ts";
export {
  createS3Storage,
  DEFAULT_PREFIX,
  OUTPUT_ID_METADATA_KEY,
  type S3ObjectClient,
  type S3StorageConfig,
} from "./s3-storage.ts";
export { createSdkLogger, type SdkLogger } from "./sdk-logger.ts";
