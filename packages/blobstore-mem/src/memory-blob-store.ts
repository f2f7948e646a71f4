/**
 * In-memory BlobStore implementation
 *
 * Keeps every container and blob in a {@link MemoryBlobState}. Best for
 * tests and short-lived storage; nothing survives the process.
 */

import type {
  Blob,
  BlobMetadata,
  BlobStore,
  BlobStoreLogger,
  Clock,
  ContentHasher,
  CreateContainerOptions,
  DirectoryDetector,
  GetOptions,
  ListContainerOptions,
  Location,
  LocatorBuilder,
  PageSet,
  PayloadInput,
  PutOptions,
  StorageMetadata,
} from "@blobvault/blobstore";
import { BlobRepository } from "./blob-repository.js";
import { ContainerRegistry } from "./container-registry.js";
import { ContentHashPipeline } from "./content-hash-pipeline.js";
import { ListingEngine } from "./listing/listing-engine.js";
import { MemoryBlobState } from "./memory-blob-state.js";

/**
 * Fully resolved collaborators of a memory store
 */
export interface MemoryBlobStoreConfig {
  defaultLocation: Location;
  clock: Clock;
  hasher: ContentHasher;
  locator: LocatorBuilder;
  directoryDetector: DirectoryDetector;
  defaultMaxResults: number;
  logger?: BlobStoreLogger;
}

export class MemoryBlobStore implements BlobStore {
  readonly state: MemoryBlobState;
  private readonly registry: ContainerRegistry;
  private readonly repository: BlobRepository;
  private readonly listing: ListingEngine;

  constructor(config: MemoryBlobStoreConfig, state: MemoryBlobState = new MemoryBlobState()) {
    this.state = state;
    this.registry = new ContainerRegistry(state, config.defaultLocation, config.logger);
    this.repository = new BlobRepository(
      state,
      new ContentHashPipeline({
        clock: config.clock,
        hasher: config.hasher,
        locator: config.locator,
      }),
      config.logger,
    );
    this.listing = new ListingEngine(state, {
      directoryDetector: config.directoryDetector,
      defaultMaxResults: config.defaultMaxResults,
      logger: config.logger,
    });
  }

  createContainer(name: string, location?: Location, options?: CreateContainerOptions): boolean {
    return this.registry.createContainer(name, location, options);
  }

  containerExists(name: string): boolean {
    return this.registry.containerExists(name);
  }

  listContainers(): PageSet<StorageMetadata> {
    return this.registry.listContainers();
  }

  deleteContainer(name: string): void {
    this.registry.deleteContainer(name);
  }

  deleteContainerIfEmpty(name: string): boolean {
    return this.registry.deleteContainerIfEmpty(name);
  }

  clearContainer(name: string): void {
    this.repository.clear(name);
  }

  putBlob(container: string, key: string, payload: PayloadInput, options?: PutOptions): string {
    return this.repository.putBlob(container, key, payload, options);
  }

  getBlob(container: string, key: string, options?: GetOptions): Blob | null {
    return this.repository.getBlob(container, key, options);
  }

  blobMetadata(container: string, key: string): BlobMetadata | null {
    return this.repository.blobMetadata(container, key);
  }

  removeBlob(container: string, key: string): void {
    this.repository.removeBlob(container, key);
  }

  blobExists(container: string, key: string): boolean {
    return this.repository.blobExists(container, key);
  }

  countBlobs(container: string): number {
    return this.repository.count(container);
  }

  list(container: string, options?: ListContainerOptions): PageSet<StorageMetadata> {
    return this.listing.list(container, options);
  }
}
