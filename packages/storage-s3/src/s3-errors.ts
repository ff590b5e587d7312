/**
 * Maps S3 failures onto the remote tier's hit / miss / error split.
 *
 * Only "the object does not exist" becomes a miss; everything else is an
 * error the caller sees.
 */

import { NoSuchKey, S3ServiceException } from "@aws-sdk/client-s3";

/**
 * Whether an S3 error means the requested object does not exist.
 *
 * Only `NoSuchKey` names a missing object. A 404 status alone does not:
 * `NoSuchBucket` is a 404 too, and a missing bucket is a configuration error.
 *
 * `AccessDenied` also counts as not-found unless its message reports a
 * signature mismatch: buckets without ListBucket permission answer reads of
 * absent keys with AccessDenied instead of NoSuchKey. This is a heuristic. A
 * backend that denies access to objects that do exist will have those reads
 * reported as misses.
 */
export const isNotFoundError = (error: unknown): boolean => {
  if (error instanceof NoSuchKey) {
    return true;
  }
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  if (error.name === "NoSuchKey") {
    return true;
  }
  if (error.name === "AccessDenied") {
    // With a bad signature it is unknown whether the key exists
    return !error.message.includes("SignatureDoesNotMatch");
  }
  return false;
};
