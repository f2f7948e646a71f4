/**
 * Node.js hashing implementation
 *
 * Uses the built-in `node:crypto` module, which hashes synchronously.
 * WebCrypto exposes no synchronous digest and no MD5 at all, so the
 * in-memory blob store relies on this module for its content hashes.
 *
 * @example
 * ```ts
 * import { createNodeHasher } from "@blobvault/utils-node";
 *
 * const hasher = createNodeHasher("md5");
 * const digest = hasher.digest(new TextEncoder().encode("hello"));
 * ```
 */
import { createHash } from "node:crypto";

/**
 * Digest algorithms supported by the Node hasher
 */
export type NodeHashAlgorithm = "md5" | "sha1" | "sha256";

/**
 * Synchronous hasher backed by node:crypto
 */
export interface NodeHasher {
  readonly algorithm: NodeHashAlgorithm;
  digest(data: Uint8Array): Uint8Array;
}

/**
 * Hash data with the given algorithm
 */
export function hashNode(algorithm: NodeHashAlgorithm, data: Uint8Array): Uint8Array {
  const hash = createHash(algorithm);
  hash.update(data);
  return new Uint8Array(hash.digest());
}

/**
 * Create a hasher bound to one algorithm
 */
export function createNodeHasher(algorithm: NodeHashAlgorithm = "md5"): NodeHasher {
  return {
    algorithm,
    digest: (data) => hashNode(algorithm, data),
  };
}
