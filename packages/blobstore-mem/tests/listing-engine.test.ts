import { type StorageMetadata, StorageType } from "@blobvault/blobstore";
import { describe, expect, it } from "vitest";
import {
  createMemoryBlobStore,
  defaultDirectoryDetector,
  markDirectories,
  noDirectoryDetector,
  paginate,
} from "../src/index.js";

function entries(...names: string[]): StorageMetadata[] {
  return names.map((name) => ({ name, type: StorageType.BLOB }));
}

describe("ListingEngine", () => {
  describe("paginate", () => {
    it("keeps everything that fits", () => {
      expect(paginate(entries("a", "b"), 2)).toEqual({ entries: entries("a", "b") });
    });

    it("cuts off and reports the last returned name", () => {
      expect(paginate(entries("a", "b", "c"), 2)).toEqual({
        entries: entries("a", "b"),
        nextMarker: "b",
      });
    });

    it("returns nothing for a non-positive size", () => {
      expect(paginate(entries("a"), 0)).toEqual({ entries: [] });
      expect(paginate(entries("a"), Number.NaN)).toEqual({ entries: [] });
    });
  });

  describe("markDirectories", () => {
    it("renames placeholders to relative paths", () => {
      const result = markDirectories(
        [
          { name: "logs_$folder$", type: StorageType.BLOB, size: 0 },
          { name: "photos/", type: StorageType.BLOB, size: 0 },
          { name: "docs", type: StorageType.BLOB, size: 0, contentType: "application/directory" },
          { name: "notes/", type: StorageType.BLOB, size: 5 },
          { name: "file.txt", type: StorageType.BLOB, size: 3 },
        ],
        defaultDirectoryDetector,
      );
      expect(result.map((e) => [e.name, e.type])).toEqual([
        ["logs", StorageType.RELATIVE_PATH],
        ["photos", StorageType.RELATIVE_PATH],
        ["docs", StorageType.RELATIVE_PATH],
        ["notes/", StorageType.BLOB],
        ["file.txt", StorageType.BLOB],
      ]);
    });

    it("leaves entries alone with the no-op detector", () => {
      const input = entries("photos/");
      expect(markDirectories(input, noDirectoryDetector)).toEqual(input);
    });
  });

  describe("directory placeholders in a store", () => {
    it("lists a placeholder under its directory name", () => {
      const store = createMemoryBlobStore();
      store.createContainer("bucket");
      store.putBlob("bucket", "photos/", new Uint8Array(0));
      store.putBlob("bucket", "readme", "hi");

      const page = store.list("bucket");
      expect(page.entries.map((e) => [e.name, e.type])).toEqual([
        ["photos", StorageType.RELATIVE_PATH],
        ["readme", StorageType.BLOB],
      ]);
    });

    it("lists one entry when placeholders collide after renaming", () => {
      const store = createMemoryBlobStore();
      store.createContainer("bucket");
      store.putBlob("bucket", "logs/", new Uint8Array(0));
      store.putBlob("bucket", "logs_$folder$", new Uint8Array(0));

      expect(store.list("bucket").entries.map((e) => e.name)).toEqual(["logs"]);
    });

    it("excludes the placeholder of the listed prefix", () => {
      const store = createMemoryBlobStore();
      store.createContainer("bucket");
      store.putBlob("bucket", "photos/", new Uint8Array(0));
      store.putBlob("bucket", "photos/cat.png", "meow");

      expect(store.list("bucket", { prefix: "photos" }).entries.map((e) => e.name)).toEqual([
        "photos/cat.png",
      ]);
    });

    it("can be disabled", () => {
      const store = createMemoryBlobStore({ directoryDetector: noDirectoryDetector });
      store.createContainer("bucket");
      store.putBlob("bucket", "photos/", new Uint8Array(0));

      expect(store.list("bucket", { recursive: true }).entries.map((e) => e.name)).toEqual([
        "photos/",
      ]);
    });
  });

  it("uses the configured default page size", () => {
    const store = createMemoryBlobStore({ defaultMaxResults: 2 });
    store.createContainer("bucket");
    for (const key of ["a", "b", "c"]) store.putBlob("bucket", key, key);

    const page = store.list("bucket");
    expect(page.entries.map((e) => e.name)).toEqual(["a", "b"]);
    expect(page.nextMarker).toBe("b");
  });
});
