/**
 * Shared state of one in-memory blob store
 *
 * A single instance is created per store and handed to every component.
 * Each container entry owns its blob map, so deleting the entry drops the
 * container and its blobs in one step.
 */

import { type Blob, ContainerNotFoundError, type Location } from "@blobvault/blobstore";

/**
 * Stored blob: payload and metadata are replaced together as one frozen
 * record, never patched in place.
 */
export type StoredBlob = Readonly<Blob>;

export interface ContainerEntry {
  readonly name: string;
  readonly location: Location;
  readonly blobs: Map<string, StoredBlob>;
}

export class MemoryBlobState {
  readonly containers = new Map<string, ContainerEntry>();

  getContainer(name: string): ContainerEntry | undefined {
    return this.containers.get(name);
  }

  containerNames(): string[] {
    return Array.from(this.containers.keys());
  }
}

/**
 * @throws ContainerNotFoundError naming the containers that do exist
 */
export function requireContainer(state: MemoryBlobState, name: string): ContainerEntry {
  const container = state.getContainer(name);
  if (!container) {
    throw new ContainerNotFoundError(
      name,
      `Container ${name} not in [${state.containerNames().join(", ")}]`,
    );
  }
  return container;
}
