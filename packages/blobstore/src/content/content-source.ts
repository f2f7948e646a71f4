/**
 * Readable content sources
 *
 * Every payload a caller can hand to a blob store is normalized behind
 * {@link ContentSource}, which reports its length (when known up front)
 * and materializes to a byte buffer. Stores always copy the bytes they
 * receive, so a source may return a view over caller memory.
 */

import { collect, collectSync } from "@blobvault/utils";
import type { ContentHeaders } from "../types.js";

export interface ContentSource {
  /** Headers the payload carries, if any */
  readonly contentMetadata?: ContentHeaders;

  /**
   * @returns Length in bytes, or undefined when unknown before reading
   */
  size(): number | undefined;

  toBytes(): Uint8Array;
}

/**
 * Anything accepted where a payload is expected
 */
export type PayloadInput = ContentSource | Uint8Array | string | Iterable<Uint8Array>;

export class BytesContentSource implements ContentSource {
  constructor(
    private readonly bytes: Uint8Array,
    readonly contentMetadata?: ContentHeaders,
  ) {}

  size(): number {
    return this.bytes.length;
  }

  toBytes(): Uint8Array {
    return this.bytes;
  }
}

/**
 * UTF-8 encoded text
 */
export class StringContentSource implements ContentSource {
  readonly contentMetadata: ContentHeaders;
  private encoded?: Uint8Array;

  constructor(
    private readonly text: string,
    contentMetadata?: ContentHeaders,
  ) {
    this.contentMetadata = { contentType: "text/plain; charset=utf-8", ...contentMetadata };
  }

  size(): number {
    return this.toBytes().length;
  }

  toBytes(): Uint8Array {
    if (!this.encoded) {
      this.encoded = new TextEncoder().encode(this.text);
    }
    return this.encoded;
  }
}

/**
 * Content produced by a synchronous sequence of chunks
 *
 * The sequence is consumed on the first read and cached.
 */
export class ChunkedContentSource implements ContentSource {
  private collected?: Uint8Array;

  constructor(
    private readonly chunks: Iterable<Uint8Array>,
    readonly contentMetadata?: ContentHeaders,
  ) {}

  size(): number | undefined {
    return this.collected?.length;
  }

  toBytes(): Uint8Array {
    if (!this.collected) {
      this.collected = collectSync(this.chunks);
    }
    return this.collected;
  }
}

/**
 * Wraps another source, overriding some of its headers
 */
export class DelegatingContentSource implements ContentSource {
  readonly contentMetadata: ContentHeaders;

  constructor(
    readonly delegate: ContentSource,
    overrides: ContentHeaders,
  ) {
    this.contentMetadata = { ...delegate.contentMetadata, ...overrides };
  }

  size(): number | undefined {
    return this.delegate.size();
  }

  toBytes(): Uint8Array {
    return this.delegate.toBytes();
  }
}

export function isContentSource(value: unknown): value is ContentSource {
  return (
    typeof value === "object" &&
    value !== null &&
    "toBytes" in value &&
    typeof value.toBytes === "function" &&
    "size" in value &&
    typeof value.size === "function"
  );
}

export function toContentSource(input: PayloadInput): ContentSource {
  if (typeof input === "string") return new StringContentSource(input);
  if (input instanceof Uint8Array) return new BytesContentSource(input);
  if (isContentSource(input)) return input;
  return new ChunkedContentSource(input);
}

/**
 * Read an async stream to the end and wrap the bytes as a source
 *
 * The store itself is synchronous; callers holding a stream await this
 * first and pass the result to `putBlob`.
 */
export async function collectContentSource(
  stream: AsyncIterable<Uint8Array>,
  contentMetadata?: ContentHeaders,
): Promise<BytesContentSource> {
  return new BytesContentSource(await collect(stream), contentMetadata);
}
