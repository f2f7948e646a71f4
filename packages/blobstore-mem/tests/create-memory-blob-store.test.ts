import { describe, expect, it, vi } from "vitest";
import { createMemoryBlobStore, DEFAULT_LOCATION } from "../src/index.js";

describe("createMemoryBlobStore", () => {
  it("creates independent stores", () => {
    const first = createMemoryBlobStore();
    const second = createMemoryBlobStore();
    first.createContainer("a");
    expect(second.containerExists("a")).toBe(false);
    expect(second.createContainer("a")).toBe(true);
  });

  it("places containers in the default location", () => {
    const store = createMemoryBlobStore();
    store.createContainer("a");
    expect(store.listContainers().entries[0].location).toEqual(DEFAULT_LOCATION);
  });

  it("accepts a custom default location", () => {
    const store = createMemoryBlobStore({ defaultLocation: { id: "us-east", scope: "region" } });
    store.createContainer("a");
    expect(store.listContainers().entries[0].location).toEqual({ id: "us-east", scope: "region" });
  });

  it("builds blob URIs with the configured scheme", () => {
    const store = createMemoryBlobStore({ uriScheme: "transient" });
    store.createContainer("bucket");
    store.putBlob("bucket", "dir/file", "x");
    expect(store.blobMetadata("bucket", "dir/file")?.uri).toBe("transient://bucket/dir/file");
  });

  it("defaults to mem:// URIs", () => {
    const store = createMemoryBlobStore();
    store.createContainer("bucket");
    store.putBlob("bucket", "k", "x");
    expect(store.blobMetadata("bucket", "k")?.uri).toBe("mem://bucket/k");
  });

  it("prefers an explicit locator", () => {
    const store = createMemoryBlobStore({
      uriScheme: "ignored",
      locator: { locate: (container, key) => `urn:${container}:${key}` },
    });
    store.createContainer("bucket");
    store.putBlob("bucket", "k", "x");
    expect(store.blobMetadata("bucket", "k")?.uri).toBe("urn:bucket:k");
  });

  it("uses an injected hasher", () => {
    const store = createMemoryBlobStore({ hasher: { digest: () => new Uint8Array([0xca, 0xfe]) } });
    store.createContainer("bucket");
    expect(store.putBlob("bucket", "k", "x")).toBe("cafe");
  });

  it("stores every user metadata key, including __proto__", () => {
    const store = createMemoryBlobStore();
    store.createContainer("bucket");
    store.putBlob("bucket", "k", "v", { userMetadata: JSON.parse('{"__proto__":"x","Owner":"a"}') });

    const userMetadata = store.getBlob("bucket", "k")?.metadata.userMetadata ?? {};
    expect(Object.keys(userMetadata)).toEqual(["__proto__", "owner"]);
    expect(Object.getOwnPropertyDescriptor(userMetadata, "__proto__")?.value).toBe("x");

    const [entry] = store.list("bucket", { detailed: true }).entries;
    expect(Object.keys(entry.userMetadata ?? {})).toEqual(["__proto__", "owner"]);
  });

  it("reports operations to the logger", () => {
    const debug = vi.fn();
    const store = createMemoryBlobStore({ logger: { debug } });
    store.createContainer("bucket");
    store.putBlob("bucket", "k", "x");
    store.getBlob("bucket", "missing");

    expect(debug).toHaveBeenCalledWith("Created container [bucket]");
    expect(debug).toHaveBeenCalledWith("Put blob with key [k] to container [bucket]");
    expect(debug).toHaveBeenCalledWith("Item missing does not exist in container bucket");
  });

  it("logs lookups against missing containers before failing", () => {
    const debug = vi.fn();
    const store = createMemoryBlobStore({ logger: { debug } });
    expect(() => store.getBlob("nope", "k")).toThrow("Container nope not in []");
    expect(debug).toHaveBeenCalledWith("Container nope does not exist");
  });

  it("reports failed writes as errors and keeps the previous blob", () => {
    const error = vi.fn();
    const failure = new Error("digest unavailable");
    let fail = false;
    const store = createMemoryBlobStore({
      logger: { error },
      hasher: {
        digest: () => {
          if (fail) throw failure;
          return new Uint8Array([0xab]);
        },
      },
    });
    store.createContainer("bucket");
    store.putBlob("bucket", "k", "old");
    fail = true;

    expect(() => store.putBlob("bucket", "k", "new")).toThrow("digest unavailable");
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      "Failed to put blob with key [k] to container [bucket]:",
      failure,
    );
    expect(new TextDecoder().decode(store.getBlob("bucket", "k")?.payload)).toBe("old");
  });

  it("works without a logger", () => {
    const store = createMemoryBlobStore({ logger: {} });
    store.createContainer("bucket");
    expect(store.getBlob("bucket", "missing")).toBeNull();
  });
});
