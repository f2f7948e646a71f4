import { describe, expect, it } from "vitest";
import {
  cloneBlob,
  cloneStorageMetadata,
  normalizeUserMetadata,
} from "../src/metadata/index.js";
import { type Blob, StorageType } from "../src/types.js";

function sampleBlob(): Blob {
  return {
    metadata: {
      name: "docs/readme.txt",
      type: StorageType.BLOB,
      container: "bucket",
      location: { id: "region-1", parent: { id: "provider" } },
      eTag: "00ff",
      lastModified: new Date(1000),
      size: 2,
      uri: "mem://bucket/docs/readme.txt",
      userMetadata: { owner: "alice" },
      content: { contentLength: 2, contentMD5: new Uint8Array([0, 255]), contentType: "text/plain" },
    },
    payload: new Uint8Array([104, 105]),
  };
}

describe("metadata clone", () => {
  it("copies blobs into independent objects", () => {
    const original = sampleBlob();
    const copy = cloneBlob(original);

    expect(copy).toEqual(original);

    copy.payload[0] = 0;
    copy.metadata.userMetadata.owner = "mallory";
    copy.metadata.lastModified.setTime(0);
    copy.metadata.content.contentMD5[0] = 7;

    expect(original.payload[0]).toBe(104);
    expect(original.metadata.userMetadata.owner).toBe("alice");
    expect(original.metadata.lastModified.getTime()).toBe(1000);
    expect(original.metadata.content.contentMD5[0]).toBe(0);
    expect(copy.metadata.location).not.toBe(original.metadata.location);
    expect(copy.metadata.location?.parent).not.toBe(original.metadata.location?.parent);
  });

  it("copies only fields present on storage metadata", () => {
    const copy = cloneStorageMetadata({ name: "a/", type: StorageType.RELATIVE_PATH });
    expect(copy).toStrictEqual({ name: "a/", type: StorageType.RELATIVE_PATH });
  });

  it("lowercases user metadata keys, last one winning", () => {
    expect(normalizeUserMetadata({ Owner: "a", OWNER: "b", team: "c" })).toEqual({
      owner: "b",
      team: "c",
    });
    expect(normalizeUserMetadata(undefined)).toEqual({});
  });

  it("keeps a user metadata key named __proto__ as a plain entry", () => {
    const normalized = normalizeUserMetadata(JSON.parse('{"__proto__":"x","Owner":"a"}'));
    expect(Object.keys(normalized)).toEqual(["__proto__", "owner"]);
    expect(Object.getOwnPropertyDescriptor(normalized, "__proto__")?.value).toBe("x");
    expect(Object.getPrototypeOf(normalized)).toBe(Object.prototype);
  });
});
