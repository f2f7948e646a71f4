/**
 * Utility functions for hash operations
 */

/**
 * Convert Uint8Array to hex string
 *
 * @returns Hexadecimal string (lowercase)
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}
