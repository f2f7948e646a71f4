import type { PayloadInput } from "./content/content-source.js";
import type {
  CreateContainerOptions,
  GetOptions,
  ListContainerOptions,
  PutOptions,
} from "./options.js";
import type { Blob, BlobMetadata, Location, PageSet, StorageMetadata } from "./types.js";

/**
 * Blob store interface
 *
 * Containers hold blobs under string keys. Keys form a flat namespace;
 * listings project a hierarchy over it by folding on "/".
 *
 * All methods are synchronous. Errors are thrown as subclasses of
 * BlobStoreError.
 */
export interface BlobStore {
  /**
   * Create a container
   *
   * @param location Placement tag, the store default when omitted
   * @returns True if created, false if the name was already taken
   * @throws InvalidArgumentError for unsupported options
   */
  createContainer(name: string, location?: Location, options?: CreateContainerOptions): boolean;

  containerExists(name: string): boolean;

  /**
   * List all containers, each carrying its location
   */
  listContainers(): PageSet<StorageMetadata>;

  /**
   * Delete a container and every blob in it. No-op when absent.
   */
  deleteContainer(name: string): void;

  /**
   * Delete a container only if it holds no blobs
   *
   * @returns False if the container exists and is not empty
   */
  deleteContainerIfEmpty(name: string): boolean;

  /**
   * Remove every blob but keep the container
   *
   * @throws ContainerNotFoundError
   */
  clearContainer(name: string): void;

  /**
   * Store a blob, replacing any previous blob under the key
   *
   * @returns ETag of the stored content (hex MD5)
   * @throws ContainerNotFoundError
   */
  putBlob(container: string, key: string, payload: PayloadInput, options?: PutOptions): string;

  /**
   * Read a blob, applying preconditions and ranges
   *
   * @returns Independent copy of the blob, or null if the key is absent
   * @throws ContainerNotFoundError if the container is absent
   * @throws PreconditionFailedError, NotModifiedError, InvalidArgumentError
   */
  getBlob(container: string, key: string, options?: GetOptions): Blob | null;

  /**
   * @returns Metadata copy, or null if the key is absent
   * @throws ContainerNotFoundError
   */
  blobMetadata(container: string, key: string): BlobMetadata | null;

  /**
   * Delete a blob. No-op when the container or key is absent.
   */
  removeBlob(container: string, key: string): void;

  /**
   * @returns False when either the container or the key is absent
   */
  blobExists(container: string, key: string): boolean;

  /**
   * @throws ContainerNotFoundError
   */
  countBlobs(container: string): number;

  /**
   * List one page of a container
   *
   * @throws ContainerNotFoundError
   */
  list(container: string, options?: ListContainerOptions): PageSet<StorageMetadata>;
}
