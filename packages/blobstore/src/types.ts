/**
 * Domain types shared by every blob store implementation.
 */

/**
 * Kind of entry in a listing
 *
 * RELATIVE_PATH entries are synthetic: they stand for a folded common
 * prefix or a directory placeholder blob and are never stored.
 */
export enum StorageType {
  CONTAINER = "CONTAINER",
  BLOB = "BLOB",
  RELATIVE_PATH = "RELATIVE_PATH",
}

/**
 * Opaque placement tag of a container
 */
export interface Location {
  readonly id: string;
  readonly description?: string;
  /** Free-form scope, e.g. "region" or "zone" */
  readonly scope?: string;
  readonly parent?: Location;
}

/**
 * Content headers a payload may carry
 */
export interface ContentHeaders {
  contentType?: string;
  contentEncoding?: string;
  contentLanguage?: string;
  contentDisposition?: string;
}

/**
 * Content headers of a stored payload, with its length and digest
 */
export interface ContentMetadata extends ContentHeaders {
  contentLength: number;
  /** Raw digest bytes of the payload */
  contentMD5: Uint8Array;
}

/**
 * String to string metadata supplied by the caller
 */
export type UserMetadata = Record<string, string>;

/**
 * Listing projection of a container, blob or relative path
 */
export interface StorageMetadata {
  name: string;
  type: StorageType;
  location?: Location;
  eTag?: string;
  lastModified?: Date;
  size?: number;
  contentType?: string;
  uri?: string;
  /** Only present in detailed listings */
  userMetadata?: UserMetadata;
}

export interface BlobMetadata extends StorageMetadata {
  type: StorageType.BLOB;
  container: string;
  eTag: string;
  lastModified: Date;
  size: number;
  uri: string;
  userMetadata: UserMetadata;
  content: ContentMetadata;
}

export interface Blob {
  metadata: BlobMetadata;
  payload: Uint8Array;
}

/**
 * One page of a listing
 *
 * `nextMarker` is set when more entries exist; pass it back as
 * `marker` to resume.
 */
export interface PageSet<T extends StorageMetadata = StorageMetadata> {
  entries: T[];
  nextMarker?: string;
}
