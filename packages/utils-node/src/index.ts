/**
 * Node.js-specific utilities for @blobvault packages
 *
 * Provides implementations that need Node.js built-in modules and
 * cannot live in the platform-neutral @blobvault/utils package.
 *
 * @packageDocumentation
 */

export * from "./hash/index.js";
