/**
 * Typed deep copies of metadata records
 *
 * Each field is copied explicitly; nested records (dates, digests,
 * user metadata, locations) get fresh instances.
 */

import type {
  Blob,
  BlobMetadata,
  ContentMetadata,
  Location,
  StorageMetadata,
  UserMetadata,
} from "../types.js";

export function cloneLocation(location: Location): Location {
  return {
    ...location,
    parent: location.parent ? cloneLocation(location.parent) : undefined,
  };
}

export function cloneUserMetadata(userMetadata: UserMetadata): UserMetadata {
  return { ...userMetadata };
}

/**
 * Lowercase all keys; on collision the entry seen last wins
 */
export function normalizeUserMetadata(userMetadata: UserMetadata | undefined): UserMetadata {
  if (!userMetadata) return {};
  return Object.fromEntries(
    Object.entries(userMetadata).map(([key, value]) => [key.toLowerCase(), value]),
  );
}

export function cloneContentMetadata(content: ContentMetadata): ContentMetadata {
  return { ...content, contentMD5: content.contentMD5.slice() };
}

export function cloneStorageMetadata(metadata: StorageMetadata): StorageMetadata {
  const copy: StorageMetadata = { name: metadata.name, type: metadata.type };
  if (metadata.location) copy.location = cloneLocation(metadata.location);
  if (metadata.eTag !== undefined) copy.eTag = metadata.eTag;
  if (metadata.lastModified) copy.lastModified = new Date(metadata.lastModified.getTime());
  if (metadata.size !== undefined) copy.size = metadata.size;
  if (metadata.contentType !== undefined) copy.contentType = metadata.contentType;
  if (metadata.uri !== undefined) copy.uri = metadata.uri;
  if (metadata.userMetadata) copy.userMetadata = cloneUserMetadata(metadata.userMetadata);
  return copy;
}

export function cloneBlobMetadata(metadata: BlobMetadata): BlobMetadata {
  return {
    name: metadata.name,
    type: metadata.type,
    container: metadata.container,
    location: metadata.location ? cloneLocation(metadata.location) : undefined,
    eTag: metadata.eTag,
    lastModified: new Date(metadata.lastModified.getTime()),
    size: metadata.size,
    contentType: metadata.contentType,
    uri: metadata.uri,
    userMetadata: cloneUserMetadata(metadata.userMetadata),
    content: cloneContentMetadata(metadata.content),
  };
}

export function cloneBlob(blob: Blob): Blob {
  return {
    metadata: cloneBlobMetadata(blob.metadata),
    payload: blob.payload.slice(),
  };
}
