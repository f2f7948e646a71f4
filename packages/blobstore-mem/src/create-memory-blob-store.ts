/**
 * Factory function for creating an in-memory blob store
 */

import {
  type BlobStoreLogger,
  type Clock,
  type ContentHasher,
  type DirectoryDetector,
  type Location,
  type LocatorBuilder,
  systemClock,
} from "@blobvault/blobstore";
import { createNodeHasher } from "@blobvault/utils-node";
import { DEFAULT_MAX_RESULTS } from "./listing/listing-engine.js";
import { defaultDirectoryDetector } from "./listing/directory-detector.js";
import { createUriLocator, DEFAULT_URI_SCHEME } from "./locator.js";
import { MemoryBlobStore } from "./memory-blob-store.js";

export const DEFAULT_LOCATION: Location = {
  id: "memory",
  description: "In-memory storage",
};

/**
 * Options for creating an in-memory blob store
 */
export interface MemoryBlobStoreOptions {
  /** Location of containers created without one */
  defaultLocation?: Location;
  /** Source of last-modified timestamps (default: system time) */
  clock?: Clock;
  /** Content digest (default: MD5 via node:crypto) */
  hasher?: ContentHasher;
  /** Blob URI builder; takes precedence over uriScheme */
  locator?: LocatorBuilder;
  /** Scheme of the default `scheme://container/key` URIs (default: "mem") */
  uriScheme?: string;
  directoryDetector?: DirectoryDetector;
  /** Page size when a listing does not set maxResults (default: 1000) */
  defaultMaxResults?: number;
  logger?: BlobStoreLogger;
}

/**
 * Create an empty in-memory blob store
 *
 * Each call returns an independent store with its own state.
 */
export function createMemoryBlobStore(options: MemoryBlobStoreOptions = {}): MemoryBlobStore {
  return new MemoryBlobStore({
    defaultLocation: options.defaultLocation ?? DEFAULT_LOCATION,
    clock: options.clock ?? systemClock,
    hasher: options.hasher ?? createNodeHasher("md5"),
    locator: options.locator ?? createUriLocator(options.uriScheme ?? DEFAULT_URI_SCHEME),
    directoryDetector: options.directoryDetector ?? defaultDirectoryDetector,
    defaultMaxResults: options.defaultMaxResults ?? DEFAULT_MAX_RESULTS,
    logger: options.logger,
  });
}
