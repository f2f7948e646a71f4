/**
 * Helpers shared by the blob store test suites
 */

import type { Clock } from "@blobvault/blobstore";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encode(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decode(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  private time: number;

  constructor(start: Date | number = Date.UTC(2024, 0, 1)) {
    this.time = typeof start === "number" ? start : start.getTime();
  }

  now(): Date {
    return new Date(this.time);
  }

  set(time: Date | number): void {
    this.time = typeof time === "number" ? time : time.getTime();
  }

  advance(ms: number): void {
    this.time += ms;
  }
}

/**
 * Zero-padded names "0000", "0001", ... used for pagination tests
 */
export function paddedNames(count: number, width = 4): string[] {
  return Array.from({ length: count }, (_, i) => String(i).padStart(width, "0"));
}
