/**
 * Blob store error classes.
 */

/**
 * Base error for all blob store operations.
 */
export class BlobStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BlobStoreError";
  }
}

/**
 * A blob-scoped or listing operation named a missing container.
 */
export class ContainerNotFoundError extends BlobStoreError {
  readonly container: string;

  constructor(container: string, message?: string) {
    super(message ?? `Container not found: ${container}`);
    this.name = "ContainerNotFoundError";
    this.container = container;
  }
}

/**
 * If-Match mismatch or If-Unmodified-Since violated.
 */
export class PreconditionFailedError extends BlobStoreError {
  readonly statusCode = 412;

  constructor(message: string) {
    super(message);
    this.name = "PreconditionFailedError";
  }
}

/**
 * If-None-Match matched or If-Modified-Since not satisfied.
 */
export class NotModifiedError extends BlobStoreError {
  readonly statusCode = 304;

  constructor(message: string) {
    super(message);
    this.name = "NotModifiedError";
  }
}

/**
 * Malformed range or unsupported option.
 */
export class InvalidArgumentError extends BlobStoreError {
  readonly argument: string;

  constructor(argument: string, message?: string) {
    super(message ?? `Invalid argument: ${argument}`);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

/**
 * Internal state is inconsistent. Indicates a bug, not a caller error.
 */
export class InternalInvariantError extends BlobStoreError {
  constructor(message: string) {
    super(message);
    this.name = "InternalInvariantError";
  }
}
