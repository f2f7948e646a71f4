/**
 * Byte range specifications
 *
 * A range is written the way an HTTP Range header lists it:
 * - "N-M": bytes N through M, both inclusive
 * - "N-": bytes from N to the end
 * - "-N": the last N bytes
 */

import { InvalidArgumentError } from "../errors.js";

export type RangeSpec =
  | { kind: "bounded"; first: number; last: number }
  | { kind: "from"; first: number }
  | { kind: "suffix"; length: number };

const RANGE_PATTERN = /^(\d*)-(\d*)$/;

/**
 * @throws InvalidArgumentError for any other shape, or when last < first
 */
export function parseRangeSpec(spec: string): RangeSpec {
  const match = RANGE_PATTERN.exec(spec);
  if (!match) {
    throw new InvalidArgumentError("range", `Malformed range: "${spec}"`);
  }
  const [, start, end] = match;
  if (start === "" && end === "") {
    throw new InvalidArgumentError("range", `Malformed range: "${spec}"`);
  }
  if (start === "") {
    return { kind: "suffix", length: Number.parseInt(end, 10) };
  }
  const first = Number.parseInt(start, 10);
  if (end === "") {
    return { kind: "from", first };
  }
  const last = Number.parseInt(end, 10);
  if (last < first) {
    throw new InvalidArgumentError("range", `Range end before start: "${spec}"`);
  }
  return { kind: "bounded", first, last };
}

/**
 * Resolve a range against a payload length
 *
 * Ranges are clamped to the payload: an end past the last byte stops at
 * the last byte, a start past the end and a suffix longer than the
 * payload select what exists (nothing, and everything, respectively).
 *
 * @returns Half-open [start, end) offsets
 */
export function resolveRange(range: RangeSpec, length: number): [number, number] {
  switch (range.kind) {
    case "suffix":
      return [Math.max(0, length - range.length), length];
    case "from":
      return [Math.min(range.first, length), length];
    case "bounded":
      return [Math.min(range.first, length), Math.min(range.last + 1, length)];
  }
}

export function byteRange(first: number, last: number): string {
  return `${first}-${last}`;
}

export function startAt(offset: number): string {
  return `${offset}-`;
}

export function tail(length: number): string {
  return `-${length}`;
}
