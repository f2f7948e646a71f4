/**
 * Per-container key to blob mapping.
 *
 * Writes go through the content hash pipeline; reads through the
 * conditional request evaluator. Every stored record is replaced whole,
 * so a reader sees either the previous blob or the new one.
 */

import {
  type Blob,
  type BlobMetadata,
  type BlobStoreLogger,
  cloneBlobMetadata,
  type GetOptions,
  type PayloadInput,
  type PutOptions,
} from "@blobvault/blobstore";
import { evaluateConditionalRead } from "./conditional-request.js";
import type { ContentHashPipeline } from "./content-hash-pipeline.js";
import { type MemoryBlobState, requireContainer, type StoredBlob } from "./memory-blob-state.js";

export class BlobRepository {
  constructor(
    private readonly state: MemoryBlobState,
    private readonly pipeline: ContentHashPipeline,
    private readonly logger?: BlobStoreLogger,
  ) {}

  /**
   * @returns ETag of the stored content
   * @throws ContainerNotFoundError
   */
  putBlob(container: string, key: string, payload: PayloadInput, options?: PutOptions): string {
    this.logger?.debug?.(`Put blob with key [${key}] to container [${container}]`);
    const entry = requireContainer(this.state, container);
    let blob: StoredBlob;
    try {
      blob = this.pipeline.prepare(entry, key, payload, options);
    } catch (error) {
      this.logger?.error?.(
        `Failed to put blob with key [${key}] to container [${container}]:`,
        error,
      );
      throw error;
    }
    entry.blobs.set(key, blob);
    return blob.metadata.eTag;
  }

  /**
   * @returns Copy of the blob, or null if the key is absent
   * @throws ContainerNotFoundError if the container is absent
   */
  getBlob(container: string, key: string, options?: GetOptions): Blob | null {
    this.logger?.debug?.(`Retrieving blob with key ${key} from container ${container}`);
    const stored = this.find(container, key);
    return stored ? evaluateConditionalRead(stored, options) : null;
  }

  /**
   * @throws ContainerNotFoundError
   */
  blobMetadata(container: string, key: string): BlobMetadata | null {
    const stored = this.find(container, key);
    return stored ? cloneBlobMetadata(stored.metadata) : null;
  }

  removeBlob(container: string, key: string): void {
    this.state.getContainer(container)?.blobs.delete(key);
  }

  blobExists(container: string, key: string): boolean {
    return this.state.getContainer(container)?.blobs.has(key) ?? false;
  }

  /**
   * @throws ContainerNotFoundError
   */
  clear(container: string): void {
    requireContainer(this.state, container).blobs.clear();
  }

  /**
   * @throws ContainerNotFoundError
   */
  count(container: string): number {
    return requireContainer(this.state, container).blobs.size;
  }

  private find(container: string, key: string): Blob | undefined {
    if (!this.state.containers.has(container)) {
      this.logger?.debug?.(`Container ${container} does not exist`);
    }
    const stored = requireContainer(this.state, container).blobs.get(key);
    if (!stored) {
      this.logger?.debug?.(`Item ${key} does not exist in container ${container}`);
    }
    return stored;
  }
}
