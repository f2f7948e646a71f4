/**
 * Parametrized test suite for blob listings
 *
 * Pagination, prefixes, markers and delimiter folding.
 */

import { ContainerNotFoundError, type PageSet, StorageType } from "@blobvault/blobstore";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ManualClock, paddedNames } from "../test-utils.js";
import type { BlobStoreFactory, BlobStoreTestContext } from "./blob-store.suite.js";

function names(page: PageSet): string[] {
  return page.entries.map((entry) => entry.name);
}

export function createListingTests(name: string, factory: BlobStoreFactory): void {
  describe(`Listing [${name}]`, () => {
    let ctx: BlobStoreTestContext;

    beforeEach(async () => {
      ctx = await factory(new ManualClock());
      ctx.store.createContainer("bucket");
    });

    afterEach(async () => {
      await ctx.cleanup?.();
    });

    function putAll(...keys: string[]): void {
      for (const key of keys) {
        ctx.store.putBlob("bucket", key, key);
      }
    }

    it("returns an empty page for an empty container", () => {
      expect(ctx.store.list("bucket")).toEqual({ entries: [] });
    });

    it("fails for a missing container", () => {
      expect(() => ctx.store.list("missing")).toThrow(ContainerNotFoundError);
    });

    it("folds nested keys into common prefixes", () => {
      putAll("a", "a/b", "a/c/d");

      const page = ctx.store.list("bucket");
      expect(names(page)).toEqual(["a", "a/"]);
      expect(page.entries[0].type).toBe(StorageType.BLOB);
      expect(page.entries[1].type).toBe(StorageType.RELATIVE_PATH);
      expect(page.nextMarker).toBeUndefined();
    });

    it("lists every key when recursive", () => {
      putAll("a", "a/b", "a/c/d");

      const page = ctx.store.list("bucket", { recursive: true });
      expect(names(page)).toEqual(["a", "a/b", "a/c/d"]);
      expect(page.entries.every((e) => e.type === StorageType.BLOB)).toBe(true);
    });

    it("sorts by code unit order", () => {
      putAll("b", "B", "a", "_", "aa");
      expect(names(ctx.store.list("bucket"))).toEqual(["B", "_", "a", "aa", "b"]);
    });

    it("paginates with a continuation marker", () => {
      putAll(...paddedNames(1500));

      const first = ctx.store.list("bucket", { maxResults: 1000 });
      expect(first.entries.length).toBe(1000);
      expect(first.entries[0].name).toBe("0000");
      expect(first.entries[999].name).toBe("0999");
      expect(first.nextMarker).toBe("0999");

      const second = ctx.store.list("bucket", { marker: "0999" });
      expect(second.entries.length).toBe(500);
      expect(second.entries[0].name).toBe("1000");
      expect(second.entries[499].name).toBe("1499");
      expect(second.nextMarker).toBeUndefined();
    });

    it("pages 1000 entries by default", () => {
      putAll(...paddedNames(1001));
      const page = ctx.store.list("bucket");
      expect(page.entries.length).toBe(1000);
      expect(page.nextMarker).toBe("0999");
    });

    it("leaves the marker unset when the page is exactly full", () => {
      putAll("a", "b", "c");
      const page = ctx.store.list("bucket", { maxResults: 3 });
      expect(names(page)).toEqual(["a", "b", "c"]);
      expect(page.nextMarker).toBeUndefined();
    });

    it("returns an empty page when maxResults is not positive", () => {
      putAll("a", "b");
      expect(ctx.store.list("bucket", { maxResults: 0 })).toEqual({ entries: [] });
      expect(ctx.store.list("bucket", { maxResults: -5 })).toEqual({ entries: [] });
    });

    it("resumes strictly after the marker", () => {
      putAll("a", "b", "c");
      expect(names(ctx.store.list("bucket", { marker: "b" }))).toEqual(["c"]);
      expect(names(ctx.store.list("bucket", { marker: "bb" }))).toEqual(["c"]);
      expect(names(ctx.store.list("bucket", { marker: "c" }))).toEqual([]);
    });

    it("walks all pages with small page sizes", () => {
      putAll("a", "b", "c", "d", "e");
      const seen: string[] = [];
      let marker: string | undefined;
      do {
        const page = ctx.store.list("bucket", { maxResults: 2, marker });
        seen.push(...names(page));
        marker = page.nextMarker;
      } while (marker !== undefined);
      expect(seen).toEqual(["a", "b", "c", "d", "e"]);
    });

    describe("prefixes", () => {
      beforeEach(() => {
        putAll("dir/a", "dir/b/c", "dir/b/d", "dirt", "other");
      });

      it("lists one level below a prefix without trailing delimiter", () => {
        expect(names(ctx.store.list("bucket", { prefix: "dir" }))).toEqual([
          "dir/a",
          "dir/b/",
          "dirt",
        ]);
      });

      it("lists one level below a prefix ending in the delimiter", () => {
        const page = ctx.store.list("bucket", { prefix: "dir/" });
        expect(names(page)).toEqual(["dir/a", "dir/b/"]);
        expect(page.entries[1].type).toBe(StorageType.RELATIVE_PATH);
      });

      it("lists nested keys recursively", () => {
        expect(names(ctx.store.list("bucket", { prefix: "dir/", recursive: true }))).toEqual([
          "dir/a",
          "dir/b/c",
          "dir/b/d",
        ]);
      });

      it("excludes an entry named exactly like the prefix", () => {
        ctx.store.putBlob("bucket", "other/x", "x");
        expect(names(ctx.store.list("bucket", { prefix: "other", recursive: true }))).toEqual([
          "other/x",
        ]);
      });

      it("returns an empty page when nothing matches", () => {
        expect(ctx.store.list("bucket", { prefix: "zzz" })).toEqual({ entries: [] });
      });

      it("combines prefix with marker", () => {
        expect(
          names(ctx.store.list("bucket", { prefix: "dir/", marker: "dir/a", recursive: true })),
        ).toEqual(["dir/b/c", "dir/b/d"]);
      });
    });

    describe("detail", () => {
      beforeEach(() => {
        ctx.store.putBlob("bucket", "k", "v", { userMetadata: { Owner: "alice" } });
      });

      it("omits user metadata by default and keeps the ETag", () => {
        const [entry] = ctx.store.list("bucket").entries;
        expect(entry.userMetadata).toBeUndefined();
        expect(entry.eTag).toBe("9e3669d19b675bd57058fd4664205d2a");
      });

      it("includes user metadata when detailed", () => {
        const [entry] = ctx.store.list("bucket", { detailed: true }).entries;
        expect(entry.userMetadata).toEqual({ owner: "alice" });
      });

      it("returns copies that cannot change stored metadata", () => {
        const [entry] = ctx.store.list("bucket", { detailed: true }).entries;
        if (entry.userMetadata) entry.userMetadata.owner = "mallory";
        expect(ctx.store.blobMetadata("bucket", "k")?.userMetadata).toEqual({ owner: "alice" });
      });
    });

    it("does not change the store", () => {
      putAll("a/b", "c");
      ctx.store.list("bucket");
      ctx.store.list("bucket", { prefix: "a", maxResults: 1 });
      expect(ctx.store.countBlobs("bucket")).toBe(2);
      expect(ctx.store.blobMetadata("bucket", "a/b")?.userMetadata).toEqual({});
    });
  });
}
