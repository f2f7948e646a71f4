/**
 * Container lifecycle: creation, lookup, listing and deletion.
 */

import {
  type BlobStoreLogger,
  type CreateContainerOptions,
  cloneLocation,
  cloneStorageMetadata,
  InvalidArgumentError,
  type Location,
  type PageSet,
  type StorageMetadata,
  StorageType,
} from "@blobvault/blobstore";
import type { MemoryBlobState } from "./memory-blob-state.js";

export class ContainerRegistry {
  constructor(
    private readonly state: MemoryBlobState,
    private readonly defaultLocation: Location,
    private readonly logger?: BlobStoreLogger,
  ) {}

  /**
   * Insert the container if the name is free
   *
   * Check and insert happen within one synchronous call, so no other
   * caller can create the same name in between.
   *
   * @returns True if created, false if the name was taken
   */
  createContainer(name: string, location?: Location, options?: CreateContainerOptions): boolean {
    if (options?.publicRead) {
      throw new InvalidArgumentError("publicRead", "publicRead containers are not supported");
    }
    const { containers } = this.state;
    if (containers.has(name)) {
      return false;
    }
    containers.set(name, {
      name,
      location: cloneLocation(location ?? this.defaultLocation),
      blobs: new Map(),
    });
    this.logger?.debug?.(`Created container [${name}]`);
    return true;
  }

  containerExists(name: string): boolean {
    return this.state.containers.has(name);
  }

  listContainers(): PageSet<StorageMetadata> {
    const entries: StorageMetadata[] = [];
    for (const container of this.state.containers.values()) {
      entries.push(
        cloneStorageMetadata({
          name: container.name,
          type: StorageType.CONTAINER,
          location: container.location,
        }),
      );
    }
    return { entries };
  }

  deleteContainer(name: string): void {
    if (this.state.containers.delete(name)) {
      this.logger?.debug?.(`Deleted container [${name}]`);
    }
  }

  /**
   * @returns True if the container is gone afterwards
   */
  deleteContainerIfEmpty(name: string): boolean {
    const container = this.state.getContainer(name);
    if (!container) {
      return true;
    }
    if (container.blobs.size > 0) {
      return false;
    }
    this.deleteContainer(name);
    return true;
  }
}
