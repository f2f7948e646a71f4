import { describe, expect, it } from "vitest";
import {
  BytesContentSource,
  ChunkedContentSource,
  collectContentSource,
  DelegatingContentSource,
  StringContentSource,
  toContentSource,
} from "../src/content/index.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

describe("content sources", () => {
  it("wraps bytes", () => {
    const source = toContentSource(new Uint8Array([1, 2, 3]));
    expect(source).toBeInstanceOf(BytesContentSource);
    expect(source.size()).toBe(3);
    expect(Array.from(source.toBytes())).toEqual([1, 2, 3]);
  });

  it("encodes strings as UTF-8 text", () => {
    const source = toContentSource("héllo");
    expect(source).toBeInstanceOf(StringContentSource);
    expect(source.size()).toBe(6);
    expect(source.contentMetadata?.contentType).toBe("text/plain; charset=utf-8");
    expect(decoder.decode(source.toBytes())).toBe("héllo");
  });

  it("lets string sources override the content type", () => {
    const source = new StringContentSource("{}", { contentType: "application/json" });
    expect(source.contentMetadata.contentType).toBe("application/json");
  });

  it("collects chunk iterables lazily", () => {
    const source = toContentSource([encoder.encode("ab"), encoder.encode("cd")]);
    expect(source).toBeInstanceOf(ChunkedContentSource);
    expect(source.size()).toBeUndefined();
    expect(decoder.decode(source.toBytes())).toBe("abcd");
    expect(source.size()).toBe(4);
  });

  it("reads a generator only once", () => {
    function* chunks(): Generator<Uint8Array> {
      yield encoder.encode("once");
    }
    const source = new ChunkedContentSource(chunks());
    expect(decoder.decode(source.toBytes())).toBe("once");
    expect(decoder.decode(source.toBytes())).toBe("once");
  });

  it("passes existing sources through", () => {
    const source = new BytesContentSource(new Uint8Array(0));
    expect(toContentSource(source)).toBe(source);
  });

  it("delegating sources override headers and keep content", () => {
    const inner = new StringContentSource("x", { contentLanguage: "en" });
    const source = new DelegatingContentSource(inner, { contentType: "text/csv" });
    expect(source.contentMetadata).toEqual({ contentType: "text/csv", contentLanguage: "en" });
    expect(source.size()).toBe(1);
    expect(decoder.decode(source.toBytes())).toBe("x");
  });

  it("collects async streams into a byte source", async () => {
    async function* stream(): AsyncIterable<Uint8Array> {
      yield encoder.encode("as");
      yield encoder.encode("ync");
    }
    const source = await collectContentSource(stream(), { contentType: "text/plain" });
    expect(source.size()).toBe(5);
    expect(decoder.decode(source.toBytes())).toBe("async");
    expect(source.contentMetadata?.contentType).toBe("text/plain");
  });
});
