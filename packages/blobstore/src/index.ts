/**
 * @blobvault/blobstore
 *
 * Blob store interfaces, domain types and errors shared by all backends.
 */

export * from "./blob-store.js";
export * from "./collaborators.js";
export * from "./content/index.js";
export * from "./errors.js";
export * from "./metadata/index.js";
export * from "./options.js";
export * from "./ranges/index.js";
export * from "./types.js";
