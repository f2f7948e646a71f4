/**
 * @blobvault/blobstore-tests
 *
 * Parametrized test suites for blob store implementations.
 * Use these suites to test any backend against the BlobStore contract.
 */

// Test suites
export * from "./suites/index.js";
// Test utilities
export * from "./test-utils.js";
