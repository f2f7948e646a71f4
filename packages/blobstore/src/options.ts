import type { ContentHeaders, UserMetadata } from "./types.js";

export interface CreateContainerOptions {
  /** Not supported by the in-memory store; rejected when true */
  publicRead?: boolean;
}

export interface PutOptions {
  contentType?: string;
  userMetadata?: UserMetadata;
  /** Other content headers; `contentType` above takes precedence */
  content?: ContentHeaders;
}

export interface ListContainerOptions {
  /** Resume after this name (exclusive) */
  marker?: string;
  prefix?: string;
  /** Page size, 1000 when omitted */
  maxResults?: number;
  /** List all keys instead of folding on "/" */
  recursive?: boolean;
  /** Keep user metadata on returned entries */
  detailed?: boolean;
}

/**
 * Preconditions and byte ranges of a read
 *
 * Ranges use the forms "N-M", "N-" and "-N"; see `byteRange`,
 * `startAt` and `tail`.
 */
export interface GetOptions {
  ifMatch?: string;
  ifNoneMatch?: string;
  ifModifiedSince?: Date;
  ifUnmodifiedSince?: Date;
  ranges?: string[];
}
