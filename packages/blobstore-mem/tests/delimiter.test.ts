import { type StorageMetadata, StorageType } from "@blobvault/blobstore";
import { describe, expect, it } from "vitest";
import { commonPrefixOf, effectivePrefix, foldDelimited } from "../src/listing/delimiter.js";

function blob(name: string): StorageMetadata {
  return { name, type: StorageType.BLOB };
}

describe("delimiter folding", () => {
  describe("effectivePrefix", () => {
    it("is empty without a prefix", () => {
      expect(effectivePrefix({ delimiter: "/" })).toBe("");
      expect(effectivePrefix({ prefix: "", delimiter: "/" })).toBe("");
    });

    it("appends the delimiter once", () => {
      expect(effectivePrefix({ prefix: "a", delimiter: "/" })).toBe("a/");
      expect(effectivePrefix({ prefix: "a/", delimiter: "/" })).toBe("a/");
    });
  });

  describe("commonPrefixOf", () => {
    const root = { delimiter: "/" };
    const under = { prefix: "photos", delimiter: "/" };

    it("returns the first segment with its delimiter", () => {
      expect(commonPrefixOf("a/b", root)).toBe("a/");
      expect(commonPrefixOf("a/c/d", root)).toBe("a/");
    });

    it("keeps names without a delimiter flat", () => {
      expect(commonPrefixOf("a", root)).toBeUndefined();
      expect(commonPrefixOf("photos/cat.png", under)).toBeUndefined();
    });

    it("folds below the prefix", () => {
      expect(commonPrefixOf("photos/2024/cat.png", under)).toBe("photos/2024/");
    });

    it("folds names that only share the prefix text", () => {
      expect(commonPrefixOf("photoshop/x", under)).toBe("photoshop/");
    });
  });

  describe("foldDelimited", () => {
    it("merges flat entries and common prefixes in name order", () => {
      const result = foldDelimited([blob("a"), blob("a/b"), blob("a/c/d"), blob("b")], {
        delimiter: "/",
      });
      expect(result).toEqual([
        blob("a"),
        { name: "a/", type: StorageType.RELATIVE_PATH },
        blob("b"),
      ]);
    });

    it("keeps the prefix's own directory entry flat", () => {
      const result = foldDelimited([blob("p/"), blob("p/q"), blob("p/r/s")], {
        prefix: "p",
        delimiter: "/",
      });
      expect(result).toEqual([
        blob("p/"),
        blob("p/q"),
        { name: "p/r/", type: StorageType.RELATIVE_PATH },
      ]);
    });

    it("returns nothing for no entries", () => {
      expect(foldDelimited([], { delimiter: "/" })).toEqual([]);
    });
  });
});
