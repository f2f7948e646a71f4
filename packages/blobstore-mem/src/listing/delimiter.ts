/**
 * Delimiter folding: a hierarchical view over flat keys.
 *
 * Keys below the listed prefix that still contain the delimiter collapse
 * into one RELATIVE_PATH entry per next path segment.
 */

import { type StorageMetadata, StorageType } from "@blobvault/blobstore";
import { compareNames, dedupeByName } from "./names.js";

export interface DelimiterConfig {
  prefix?: string;
  delimiter: string;
}

/**
 * The part of a name stripped before looking for the delimiter.
 * Empty without a prefix; otherwise the prefix ending in the delimiter.
 */
export function effectivePrefix({ prefix, delimiter }: DelimiterConfig): string {
  if (!prefix) return "";
  return prefix.endsWith(delimiter) ? prefix : prefix + delimiter;
}

/**
 * @returns The common prefix the name folds into (ending in the
 * delimiter), or undefined if the name stays a flat entry
 */
export function commonPrefixOf(name: string, config: DelimiterConfig): string | undefined {
  const strip = effectivePrefix(config);
  const base = strip !== "" && name.startsWith(strip) ? strip : "";
  const remainder = name.slice(base.length);
  const index = remainder.indexOf(config.delimiter);
  if (index < 0) return undefined;
  return base + remainder.slice(0, index + config.delimiter.length);
}

/**
 * Split entries into flat entries and common prefixes
 *
 * @returns Both sets merged, deduplicated by name and sorted
 */
export function foldDelimited(
  entries: readonly StorageMetadata[],
  config: DelimiterConfig,
): StorageMetadata[] {
  const flat: StorageMetadata[] = [];
  const prefixes = new Set<string>();
  for (const entry of entries) {
    const commonPrefix = commonPrefixOf(entry.name, config);
    if (commonPrefix === undefined) {
      flat.push(entry);
    } else {
      prefixes.add(commonPrefix);
    }
  }
  const folded: StorageMetadata[] = Array.from(prefixes, (name) => ({
    name,
    type: StorageType.RELATIVE_PATH,
  }));
  return dedupeByName([...flat, ...folded]).sort(compareNames);
}
