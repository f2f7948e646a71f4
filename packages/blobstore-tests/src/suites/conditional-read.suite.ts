/**
 * Parametrized test suite for conditional and ranged reads
 */

import {
  byteRange,
  InvalidArgumentError,
  NotModifiedError,
  PreconditionFailedError,
  startAt,
  tail,
} from "@blobvault/blobstore";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { decode, ManualClock } from "../test-utils.js";
import type { BlobStoreFactory, BlobStoreTestContext } from "./blob-store.suite.js";

const DIGITS_ETAG = "781e5e245d69b566979b86e28d23f2c7";
const WRITTEN_AT = Date.UTC(2024, 5, 1, 12, 0, 0);

export function createConditionalReadTests(name: string, factory: BlobStoreFactory): void {
  describe(`Conditional reads [${name}]`, () => {
    let ctx: BlobStoreTestContext;

    beforeEach(async () => {
      ctx = await factory(new ManualClock(WRITTEN_AT));
      ctx.store.createContainer("bucket");
      ctx.store.putBlob("bucket", "digits", "0123456789");
    });

    afterEach(async () => {
      await ctx.cleanup?.();
    });

    function read(ranges: string[]): string {
      const blob = ctx.store.getBlob("bucket", "digits", { ranges });
      if (!blob) throw new Error("blob expected");
      return decode(blob.payload);
    }

    describe("preconditions", () => {
      it("passes a matching If-Match", () => {
        const blob = ctx.store.getBlob("bucket", "digits", { ifMatch: DIGITS_ETAG });
        expect(blob?.metadata.eTag).toBe(DIGITS_ETAG);
      });

      it("fails a mismatching If-Match", () => {
        expect(() => ctx.store.getBlob("bucket", "digits", { ifMatch: "e2" })).toThrow(
          PreconditionFailedError,
        );
      });

      it("fails a matching If-None-Match as not modified", () => {
        expect(() => ctx.store.getBlob("bucket", "digits", { ifNoneMatch: DIGITS_ETAG })).toThrow(
          NotModifiedError,
        );
        expect(ctx.store.getBlob("bucket", "digits", { ifNoneMatch: "other" })).not.toBeNull();
      });

      it("fails If-Modified-Since when the blob is older", () => {
        expect(() =>
          ctx.store.getBlob("bucket", "digits", { ifModifiedSince: new Date(WRITTEN_AT + 1) }),
        ).toThrow(NotModifiedError);
        expect(
          ctx.store.getBlob("bucket", "digits", { ifModifiedSince: new Date(WRITTEN_AT) }),
        ).not.toBeNull();
      });

      it("fails If-Unmodified-Since when the blob is newer", () => {
        expect(() =>
          ctx.store.getBlob("bucket", "digits", { ifUnmodifiedSince: new Date(WRITTEN_AT - 1) }),
        ).toThrow(PreconditionFailedError);
        expect(
          ctx.store.getBlob("bucket", "digits", { ifUnmodifiedSince: new Date(WRITTEN_AT) }),
        ).not.toBeNull();
      });

      it("evaluates If-Match before If-None-Match", () => {
        expect(() =>
          ctx.store.getBlob("bucket", "digits", { ifMatch: "e2", ifNoneMatch: DIGITS_ETAG }),
        ).toThrow(PreconditionFailedError);
      });

      it("carries the emulated status code", () => {
        try {
          ctx.store.getBlob("bucket", "digits", { ifNoneMatch: DIGITS_ETAG });
          expect.unreachable("getBlob should have thrown");
        } catch (error) {
          expect(error).toBeInstanceOf(NotModifiedError);
          if (error instanceof NotModifiedError) {
            expect(error.statusCode).toBe(304);
          }
        }
      });

      it("reports null for a missing key before checking preconditions", () => {
        expect(ctx.store.getBlob("bucket", "missing", { ifMatch: "e2" })).toBeNull();
      });
    });

    describe("ranges", () => {
      it("reads an inclusive range", () => {
        expect(read(["2-4"])).toBe("234");
      });

      it("reads a suffix", () => {
        expect(read(["-3"])).toBe("789");
      });

      it("reads from an offset to the end", () => {
        expect(read(["7-"])).toBe("789");
      });

      it("concatenates ranges in request order without merging", () => {
        expect(read(["7-", "0-1", "1-2"])).toBe("7890112");
      });

      it("clamps ranges past the end of the payload", () => {
        expect(read(["8-20"])).toBe("89");
        expect(read(["-25"])).toBe("0123456789");
        expect(read(["12-"])).toBe("");
        expect(read(["12-15"])).toBe("");
      });

      it("updates the content length", () => {
        const blob = ctx.store.getBlob("bucket", "digits", { ranges: ["2-4", "-1"] });
        expect(blob?.metadata.size).toBe(4);
        expect(blob?.metadata.content.contentLength).toBe(4);
        expect(blob?.metadata.eTag).toBe(DIGITS_ETAG);
      });

      it("reads the whole blob for an empty range list", () => {
        expect(read([])).toBe("0123456789");
      });

      it("builds ranges with helpers", () => {
        expect(read([byteRange(2, 4), startAt(9), tail(2)])).toBe("234989");
      });

      it("rejects malformed ranges", () => {
        expect(() => read(["abc"])).toThrow(InvalidArgumentError);
        expect(() => read(["-"])).toThrow(InvalidArgumentError);
        expect(() => read(["4-2"])).toThrow(InvalidArgumentError);
      });

      it("leaves the stored blob untouched", () => {
        read(["2-4"]);
        const blob = ctx.store.getBlob("bucket", "digits");
        expect(decode(blob?.payload ?? new Uint8Array(0))).toBe("0123456789");
        expect(blob?.metadata.size).toBe(10);
      });
    });
  });
}
