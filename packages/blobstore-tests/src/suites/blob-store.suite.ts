/**
 * Parametrized test suite for BlobStore implementations
 *
 * Covers container lifecycle and blob storage. All backends must pass.
 */

import {
  type BlobStore,
  BytesContentSource,
  ChunkedContentSource,
  ContainerNotFoundError,
  InvalidArgumentError,
  StorageType,
} from "@blobvault/blobstore";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { decode, encode, ManualClock } from "../test-utils.js";

/**
 * Context provided by the store factory
 */
export interface BlobStoreTestContext {
  store: BlobStore;
  clock: ManualClock;
  cleanup?: () => Promise<void>;
}

/**
 * Factory creating an empty store whose timestamps come from `clock`
 */
export type BlobStoreFactory = (clock: ManualClock) => Promise<BlobStoreTestContext>;

/**
 * Create the BlobStore test suite with a specific factory
 *
 * @param name Name of the implementation (e.g., "InMemory")
 */
export function createBlobStoreTests(name: string, factory: BlobStoreFactory): void {
  describe(`BlobStore [${name}]`, () => {
    let ctx: BlobStoreTestContext;

    beforeEach(async () => {
      ctx = await factory(new ManualClock());
    });

    afterEach(async () => {
      await ctx.cleanup?.();
    });

    describe("Containers", () => {
      it("creates a container once", () => {
        expect(ctx.store.createContainer("photos")).toBe(true);
        expect(ctx.store.createContainer("photos")).toBe(false);
        expect(ctx.store.containerExists("photos")).toBe(true);
        expect(ctx.store.containerExists("videos")).toBe(false);
      });

      it("lists containers with their locations", () => {
        ctx.store.createContainer("a", { id: "eu-west" });
        ctx.store.createContainer("b");

        const { entries, nextMarker } = ctx.store.listContainers();
        expect(nextMarker).toBeUndefined();
        expect(entries.map((e) => e.name).sort()).toEqual(["a", "b"]);
        for (const entry of entries) {
          expect(entry.type).toBe(StorageType.CONTAINER);
          expect(entry.location).toBeDefined();
        }
        expect(entries.find((e) => e.name === "a")?.location?.id).toBe("eu-west");
      });

      it("keeps the first location when creation is repeated", () => {
        ctx.store.createContainer("a", { id: "first" });
        ctx.store.createContainer("a", { id: "second" });
        expect(ctx.store.listContainers().entries[0].location?.id).toBe("first");
      });

      it("rejects publicRead containers", () => {
        expect(() => ctx.store.createContainer("public", undefined, { publicRead: true })).toThrow(
          InvalidArgumentError,
        );
        expect(ctx.store.containerExists("public")).toBe(false);
      });

      it("deletes a container with its blobs", () => {
        ctx.store.createContainer("c");
        ctx.store.putBlob("c", "k", "v");
        ctx.store.deleteContainer("c");

        expect(ctx.store.containerExists("c")).toBe(false);
        expect(ctx.store.blobExists("c", "k")).toBe(false);

        ctx.store.createContainer("c");
        expect(ctx.store.countBlobs("c")).toBe(0);
      });

      it("deletes absent containers as a no-op", () => {
        ctx.store.deleteContainer("missing");
        ctx.store.createContainer("once");
        ctx.store.deleteContainer("once");
        ctx.store.deleteContainer("once");
        expect(ctx.store.containerExists("once")).toBe(false);
      });

      it("deletes only empty containers with deleteContainerIfEmpty", () => {
        ctx.store.createContainer("empty");
        ctx.store.createContainer("full");
        ctx.store.putBlob("full", "k", "v");

        expect(ctx.store.deleteContainerIfEmpty("empty")).toBe(true);
        expect(ctx.store.containerExists("empty")).toBe(false);

        expect(ctx.store.deleteContainerIfEmpty("full")).toBe(false);
        expect(ctx.store.containerExists("full")).toBe(true);
        expect(ctx.store.blobExists("full", "k")).toBe(true);

        expect(ctx.store.deleteContainerIfEmpty("missing")).toBe(true);
      });

      it("clears blobs but keeps the container", () => {
        ctx.store.createContainer("c");
        ctx.store.putBlob("c", "a", "1");
        ctx.store.putBlob("c", "b", "2");

        ctx.store.clearContainer("c");

        expect(ctx.store.containerExists("c")).toBe(true);
        expect(ctx.store.countBlobs("c")).toBe(0);
        expect(() => ctx.store.clearContainer("missing")).toThrow(ContainerNotFoundError);
      });
    });

    describe("Blobs", () => {
      beforeEach(() => {
        ctx.store.createContainer("bucket");
      });

      it("stores and retrieves content", () => {
        const etag = ctx.store.putBlob("bucket", "greeting", encode("Hello, World!"));
        expect(etag).toBe("65a8e27d8879283831b664bd8b7f0ad4");

        const blob = ctx.store.getBlob("bucket", "greeting");
        expect(blob).not.toBeNull();
        expect(decode(blob?.payload ?? new Uint8Array(0))).toBe("Hello, World!");
        expect(blob?.metadata.eTag).toBe(etag);
        expect(blob?.metadata.size).toBe(13);
        expect(blob?.metadata.content.contentLength).toBe(13);
        expect(blob?.metadata.container).toBe("bucket");
        expect(blob?.metadata.name).toBe("greeting");
        expect(blob?.metadata.type).toBe(StorageType.BLOB);
      });

      it("stores empty content", () => {
        const etag = ctx.store.putBlob("bucket", "empty", new Uint8Array(0));
        expect(etag).toBe("d41d8cd98f00b204e9800998ecf8427e");
        expect(ctx.store.getBlob("bucket", "empty")?.payload.length).toBe(0);
      });

      it("stores binary content with null bytes", () => {
        const content = new Uint8Array([0, 1, 2, 0, 255, 0, 254]);
        ctx.store.putBlob("bucket", "bin", content);
        expect(ctx.store.getBlob("bucket", "bin")?.payload).toEqual(content);
      });

      it("accepts chunked and wrapped sources", () => {
        ctx.store.putBlob("bucket", "chunks", new ChunkedContentSource([encode("01234"), encode("56789")]));
        ctx.store.putBlob("bucket", "wrapped", new BytesContentSource(encode("0123456789")));

        expect(ctx.store.getBlob("bucket", "chunks")?.metadata.eTag).toBe(
          "781e5e245d69b566979b86e28d23f2c7",
        );
        expect(ctx.store.getBlob("bucket", "wrapped")?.metadata.eTag).toBe(
          "781e5e245d69b566979b86e28d23f2c7",
        );
      });

      it("returns null for a missing key", () => {
        expect(ctx.store.getBlob("bucket", "missing")).toBeNull();
        expect(ctx.store.blobMetadata("bucket", "missing")).toBeNull();
      });

      it("fails reads against a missing container", () => {
        expect(() => ctx.store.getBlob("nope", "k")).toThrow(ContainerNotFoundError);
        expect(() => ctx.store.blobMetadata("nope", "k")).toThrow(ContainerNotFoundError);
        expect(() => ctx.store.putBlob("nope", "k", "v")).toThrow(ContainerNotFoundError);
        expect(() => ctx.store.countBlobs("nope")).toThrow(ContainerNotFoundError);
      });

      it("reports the missing container name", () => {
        try {
          ctx.store.getBlob("nope", "k");
          expect.unreachable("getBlob should have thrown");
        } catch (error) {
          expect(error).toBeInstanceOf(ContainerNotFoundError);
          if (error instanceof ContainerNotFoundError) {
            expect(error.container).toBe("nope");
          }
        }
      });

      it("checks existence without failing on missing containers", () => {
        ctx.store.putBlob("bucket", "k", "v");
        expect(ctx.store.blobExists("bucket", "k")).toBe(true);
        expect(ctx.store.blobExists("bucket", "other")).toBe(false);
        expect(ctx.store.blobExists("nope", "k")).toBe(false);
      });

      it("removes blobs, ignoring absent ones", () => {
        ctx.store.putBlob("bucket", "k", "v");
        ctx.store.removeBlob("bucket", "k");
        ctx.store.removeBlob("bucket", "k");
        ctx.store.removeBlob("nope", "k");
        expect(ctx.store.blobExists("bucket", "k")).toBe(false);
      });

      it("stamps last-modified on every write", () => {
        ctx.store.putBlob("bucket", "k", "one");
        expect(ctx.store.blobMetadata("bucket", "k")?.lastModified.toISOString()).toBe(
          "2024-01-01T00:00:00.000Z",
        );

        ctx.clock.advance(60_000);
        ctx.store.putBlob("bucket", "k", "two");
        expect(ctx.store.blobMetadata("bucket", "k")?.lastModified.toISOString()).toBe(
          "2024-01-01T00:01:00.000Z",
        );
      });

      it("replaces payload and metadata on overwrite", () => {
        ctx.store.putBlob("bucket", "k", "first", {
          contentType: "text/csv",
          userMetadata: { owner: "alice" },
        });
        const etag = ctx.store.putBlob("bucket", "k", encode("hello"));

        const blob = ctx.store.getBlob("bucket", "k");
        expect(etag).toBe("5d41402abc4b2a76b9719d911017c592");
        expect(decode(blob?.payload ?? new Uint8Array(0))).toBe("hello");
        expect(blob?.metadata.userMetadata).toEqual({});
        expect(blob?.metadata.content.contentType).toBe("application/octet-stream");
      });

      it("lowercases user metadata keys", () => {
        ctx.store.putBlob("bucket", "k", "v", { userMetadata: { Owner: "alice", TEAM: "core" } });
        expect(ctx.store.blobMetadata("bucket", "k")?.userMetadata).toEqual({
          owner: "alice",
          team: "core",
        });
      });

      it("takes content headers from options over the source", () => {
        ctx.store.putBlob("bucket", "text", "plain");
        ctx.store.putBlob("bucket", "json", "{}", {
          contentType: "application/json",
          content: { contentEncoding: "identity", contentType: "text/other" },
        });

        expect(ctx.store.blobMetadata("bucket", "text")?.content.contentType).toBe(
          "text/plain; charset=utf-8",
        );
        const json = ctx.store.blobMetadata("bucket", "json")?.content;
        expect(json?.contentType).toBe("application/json");
        expect(json?.contentEncoding).toBe("identity");
      });

      it("isolates stored state from caller buffers and returned copies", () => {
        const content = encode("abc");
        ctx.store.putBlob("bucket", "k", content, { userMetadata: { tag: "x" } });
        content[0] = 0;

        const first = ctx.store.getBlob("bucket", "k");
        if (!first) throw new Error("blob expected");
        first.payload[1] = 0;
        first.metadata.userMetadata.tag = "changed";
        first.metadata.lastModified.setTime(0);

        const second = ctx.store.getBlob("bucket", "k");
        expect(decode(second?.payload ?? new Uint8Array(0))).toBe("abc");
        expect(second?.metadata.userMetadata.tag).toBe("x");
        expect(second?.metadata.lastModified.getTime()).toBe(Date.UTC(2024, 0, 1));
      });

      it("counts blobs per container", () => {
        ctx.store.createContainer("other");
        ctx.store.putBlob("bucket", "a", "1");
        ctx.store.putBlob("bucket", "b", "2");
        ctx.store.putBlob("other", "a", "1");
        expect(ctx.store.countBlobs("bucket")).toBe(2);
        expect(ctx.store.countBlobs("other")).toBe(1);
      });
    });
  });
}
