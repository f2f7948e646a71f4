/**
 * In-memory blob store for @blobvault
 *
 * Containers, blobs, listings and conditional reads held entirely in
 * process memory.
 */

export * from "./blob-repository.js";
export * from "./conditional-request.js";
export * from "./container-registry.js";
export * from "./content-hash-pipeline.js";
export * from "./create-memory-blob-store.js";
export * from "./listing/delimiter.js";
export * from "./listing/directory-detector.js";
export * from "./listing/listing-engine.js";
export * from "./listing/names.js";
export * from "./locator.js";
export * from "./memory-blob-state.js";
export * from "./memory-blob-store.js";
