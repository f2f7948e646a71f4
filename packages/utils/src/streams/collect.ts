import { concatBytes } from "../bytes/concat-bytes.js";

/**
 * Collect async stream chunks into single Uint8Array.
 *
 * Used where content has to be fully materialized before it is handed
 * to a synchronous consumer (e.g. the in-memory blob store).
 */
export async function collect(
  input: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of input) {
    chunks.push(chunk);
  }
  return concatBytes(chunks);
}

/**
 * Synchronous counterpart of {@link collect} for plain iterables.
 */
export function collectSync(input: Iterable<Uint8Array>): Uint8Array {
  return concatBytes(Array.from(input));
}
