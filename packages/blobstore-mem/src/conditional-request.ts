/**
 * Preconditions and byte ranges applied to a stored blob on read.
 */

import {
  type Blob,
  cloneBlob,
  type GetOptions,
  NotModifiedError,
  parseRangeSpec,
  PreconditionFailedError,
  resolveRange,
} from "@blobvault/blobstore";
import { concatBytes } from "@blobvault/utils";

/**
 * Check preconditions in order, failing on the first that does not hold:
 * if-match, if-none-match, if-modified-since, if-unmodified-since.
 */
export function checkPreconditions(blob: Blob, options: GetOptions): void {
  const { eTag, lastModified } = blob.metadata;

  if (options.ifMatch !== undefined && eTag !== options.ifMatch) {
    throw new PreconditionFailedError(`ETag ${eTag} does not match ${options.ifMatch}`);
  }
  if (options.ifNoneMatch !== undefined && eTag === options.ifNoneMatch) {
    throw new NotModifiedError(`ETag ${eTag} matches ${options.ifNoneMatch}`);
  }
  if (options.ifModifiedSince && lastModified.getTime() < options.ifModifiedSince.getTime()) {
    throw new NotModifiedError(
      `${lastModified.toISOString()} is before ${options.ifModifiedSince.toISOString()}`,
    );
  }
  if (options.ifUnmodifiedSince && lastModified.getTime() > options.ifUnmodifiedSince.getTime()) {
    throw new PreconditionFailedError(
      `${lastModified.toISOString()} is after ${options.ifUnmodifiedSince.toISOString()}`,
    );
  }
}

/**
 * Extract ranges in request order and concatenate them
 *
 * Overlapping ranges are neither merged nor reordered, so their bytes
 * repeat in the result.
 */
export function extractRanges(payload: Uint8Array, ranges: readonly string[]): Uint8Array {
  const parts = ranges.map((spec) => {
    const [start, end] = resolveRange(parseRangeSpec(spec), payload.length);
    return payload.subarray(start, end);
  });
  return concatBytes(parts);
}

/**
 * Evaluate a read against a stored blob
 *
 * @returns Independent copy, narrowed to the requested ranges
 * @throws PreconditionFailedError, NotModifiedError, InvalidArgumentError
 */
export function evaluateConditionalRead(blob: Blob, options?: GetOptions): Blob {
  if (options) {
    checkPreconditions(blob, options);
  }
  const copy = cloneBlob(blob);
  if (options?.ranges && options.ranges.length > 0) {
    const payload = extractRanges(blob.payload, options.ranges);
    copy.payload = payload;
    copy.metadata.size = payload.length;
    copy.metadata.content.contentLength = payload.length;
  }
  return copy;
}
