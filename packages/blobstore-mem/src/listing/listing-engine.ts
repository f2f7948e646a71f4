/**
 * Paginated, optionally hierarchical listing of a container.
 *
 * A listing works on a snapshot taken in one synchronous pass over the
 * container's blob map and never writes back to the store.
 */

import {
  type BlobMetadata,
  type BlobStoreLogger,
  cloneStorageMetadata,
  type DirectoryDetector,
  type ListContainerOptions,
  type PageSet,
  type StorageMetadata,
  StorageType,
} from "@blobvault/blobstore";
import { type MemoryBlobState, requireContainer } from "../memory-blob-state.js";
import { foldDelimited } from "./delimiter.js";
import { afterMarker, compareNames, dedupeByName, underPrefix } from "./names.js";

export const DEFAULT_MAX_RESULTS = 1000;
export const DELIMITER = "/";

/**
 * Listing projection of a stored blob
 */
export function toStorageMetadata(metadata: BlobMetadata): StorageMetadata {
  return cloneStorageMetadata({
    name: metadata.name,
    type: StorageType.BLOB,
    eTag: metadata.eTag,
    lastModified: metadata.lastModified,
    size: metadata.size,
    contentType: metadata.content.contentType,
    uri: metadata.uri,
    userMetadata: metadata.userMetadata,
  });
}

/**
 * Rename directory placeholders to their directory name
 */
export function markDirectories(
  entries: readonly StorageMetadata[],
  detector: DirectoryDetector,
): StorageMetadata[] {
  return entries.map((entry) => {
    const directoryName = detector.detect(entry);
    if (directoryName === undefined) return entry;
    return { ...entry, name: directoryName, type: StorageType.RELATIVE_PATH };
  });
}

/**
 * Take at most maxResults entries
 *
 * @returns The page and, if anything was cut off, the name to resume after
 */
export function paginate(
  entries: readonly StorageMetadata[],
  maxResults: number,
): { entries: StorageMetadata[]; nextMarker?: string } {
  // Also rejects NaN.
  if (!(maxResults > 0)) return { entries: [] };
  if (entries.length <= maxResults) return { entries: [...entries] };
  const page = entries.slice(0, maxResults);
  return { entries: page, nextMarker: page[page.length - 1].name };
}

export interface ListingEngineOptions {
  directoryDetector: DirectoryDetector;
  defaultMaxResults?: number;
  logger?: BlobStoreLogger;
}

export class ListingEngine {
  private readonly defaultMaxResults: number;

  constructor(
    private readonly state: MemoryBlobState,
    private readonly options: ListingEngineOptions,
  ) {
    this.defaultMaxResults = options.defaultMaxResults ?? DEFAULT_MAX_RESULTS;
  }

  /**
   * @throws ContainerNotFoundError
   */
  list(container: string, options: ListContainerOptions = {}): PageSet<StorageMetadata> {
    const snapshot = this.snapshot(container);

    let entries = dedupeByName(
      markDirectories(snapshot, this.options.directoryDetector).sort(compareNames),
    );
    if (options.marker !== undefined) {
      entries = afterMarker(entries, options.marker);
    }
    if (options.prefix !== undefined) {
      entries = underPrefix(entries, options.prefix);
    }

    const page = paginate(entries, options.maxResults ?? this.defaultMaxResults);
    entries = page.entries;

    if (!options.recursive) {
      entries = foldDelimited(entries, { prefix: options.prefix, delimiter: DELIMITER });
    }
    if (!options.detailed) {
      for (const entry of entries) {
        delete entry.userMetadata;
      }
    }

    this.options.logger?.debug?.(
      `Listed ${entries.length} entries of container [${container}]`,
    );
    return page.nextMarker === undefined ? { entries } : { entries, nextMarker: page.nextMarker };
  }

  private snapshot(container: string): StorageMetadata[] {
    const entry = requireContainer(this.state, container);
    return Array.from(entry.blobs.values(), (blob) => toStorageMetadata(blob.metadata));
  }
}
