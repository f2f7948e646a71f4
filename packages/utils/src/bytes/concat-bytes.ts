/**
 * Join byte chunks into a single newly allocated buffer.
 *
 * The result never aliases any of the inputs, even for a single chunk,
 * so callers can hand it to storage without further copying.
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let totalLength = 0;
  for (const chunk of chunks) {
    totalLength += chunk.length;
  }
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

