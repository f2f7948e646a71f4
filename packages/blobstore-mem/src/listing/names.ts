import type { StorageMetadata } from "@blobvault/blobstore";

/**
 * Order by UTF-16 code units, independent of locale.
 */
export function compareNames(a: StorageMetadata, b: StorageMetadata): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Keep the first entry seen for each name
 */
export function dedupeByName(entries: readonly StorageMetadata[]): StorageMetadata[] {
  const seen = new Set<string>();
  const result: StorageMetadata[] = [];
  for (const entry of entries) {
    if (seen.has(entry.name)) continue;
    seen.add(entry.name);
    result.push(entry);
  }
  return result;
}

/**
 * Names strictly after the marker
 */
export function afterMarker(entries: readonly StorageMetadata[], marker: string): StorageMetadata[] {
  return entries.filter((entry) => entry.name > marker);
}

/**
 * Names under the prefix, excluding the prefix itself
 */
export function underPrefix(entries: readonly StorageMetadata[], prefix: string): StorageMetadata[] {
  return entries.filter((entry) => entry.name.startsWith(prefix) && entry.name !== prefix);
}
