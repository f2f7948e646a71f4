/**
 * Turns a put request into a stored blob record.
 *
 * Steps:
 * 1. Copy the payload into a buffer owned by the store
 * 2. Digest it; the hex digest becomes the ETag
 * 3. Stamp last-modified from the injected clock
 * 4. Build the synthetic URI
 * 5. Lowercase user metadata keys
 * 6. Merge content headers: put options, then the source's own, then defaults
 */

import {
  type Blob,
  type Clock,
  type ContentHasher,
  type ContentHeaders,
  InternalInvariantError,
  type LocatorBuilder,
  normalizeUserMetadata,
  type PayloadInput,
  type PutOptions,
  StorageType,
  toContentSource,
} from "@blobvault/blobstore";
import { bytesToHex } from "@blobvault/utils";
import type { ContainerEntry, StoredBlob } from "./memory-blob-state.js";

export const DEFAULT_CONTENT_TYPE = "application/octet-stream";

export interface ContentHashPipelineOptions {
  clock: Clock;
  hasher: ContentHasher;
  locator: LocatorBuilder;
}

/**
 * Merge header sets left to right; undefined values never override.
 */
export function mergeContentHeaders(...layers: (ContentHeaders | undefined)[]): ContentHeaders {
  const result: ContentHeaders = {};
  for (const layer of layers) {
    if (!layer) continue;
    if (layer.contentType !== undefined) result.contentType = layer.contentType;
    if (layer.contentEncoding !== undefined) result.contentEncoding = layer.contentEncoding;
    if (layer.contentLanguage !== undefined) result.contentLanguage = layer.contentLanguage;
    if (layer.contentDisposition !== undefined) {
      result.contentDisposition = layer.contentDisposition;
    }
  }
  return result;
}

export class ContentHashPipeline {
  constructor(private readonly options: ContentHashPipelineOptions) {}

  prepare(
    container: ContainerEntry,
    key: string,
    payload: PayloadInput,
    options?: PutOptions,
  ): StoredBlob {
    const source = toContentSource(payload);
    const declaredSize = source.size();
    // The store owns its copy of the payload.
    const bytes = source.toBytes().slice();
    if (declaredSize !== undefined && declaredSize !== bytes.length) {
      throw new InternalInvariantError(
        `Content source reported ${declaredSize} bytes but produced ${bytes.length}`,
      );
    }

    const digest = this.options.hasher.digest(bytes);
    const headers = mergeContentHeaders(
      { contentType: DEFAULT_CONTENT_TYPE },
      source.contentMetadata,
      options?.content,
      { contentType: options?.contentType },
    );

    const blob: Blob = {
      metadata: {
        name: key,
        type: StorageType.BLOB,
        container: container.name,
        location: container.location,
        eTag: bytesToHex(digest),
        lastModified: new Date(this.options.clock.now().getTime()),
        size: bytes.length,
        contentType: headers.contentType,
        uri: this.options.locator.locate(container.name, key),
        userMetadata: normalizeUserMetadata(options?.userMetadata),
        content: {
          ...headers,
          contentLength: bytes.length,
          contentMD5: digest,
        },
      },
      payload: bytes,
    };
    return Object.freeze(blob);
  }
}
