import type { LocatorBuilder } from "@blobvault/blobstore";

export const DEFAULT_URI_SCHEME = "mem";

/**
 * Locator producing `scheme://container/key`
 */
export function createUriLocator(scheme: string = DEFAULT_URI_SCHEME): LocatorBuilder {
  return {
    locate: (container, key) => `${scheme}://${container}/${key}`,
  };
}
