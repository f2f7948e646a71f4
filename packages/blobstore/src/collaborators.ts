/**
 * Interfaces of the services a blob store depends on.
 *
 * Implementations are injected at construction time, so tests can pin
 * the clock and swap the hash function.
 */

import type { StorageMetadata } from "./types.js";

/**
 * Source of wall-clock time
 */
export interface Clock {
  now(): Date;
}

/**
 * Fixed-size content digest
 */
export interface ContentHasher {
  digest(data: Uint8Array): Uint8Array;
}

/**
 * Builds the synthetic URI of a stored blob
 */
export interface LocatorBuilder {
  locate(container: string, key: string): string;
}

/**
 * Recognizes blobs that only mark a pseudo-directory
 */
export interface DirectoryDetector {
  /**
   * @returns Directory name, or undefined for a regular blob
   */
  detect(metadata: StorageMetadata): string | undefined;
}

/**
 * Optional logger for debugging.
 */
export interface BlobStoreLogger {
  debug?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
