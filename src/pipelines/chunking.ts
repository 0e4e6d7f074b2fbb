import { ConfigurationError } from "../domain/errors.js";
import { Chunk } from "../domain/types.js";
import { splitWords } from "../utils/text.js";

export const DEFAULT_CHUNK_SIZE = 300;
export const DEFAULT_CHUNK_OVERLAP = 50;

/**
 * Splits `text` into windows of `size` words, each starting `size - overlap`
 * words after the previous one, until a window would start past the last
 * word. Trailing windows may be shorter than `size`.
 */
export function splitIntoChunks(
  text: string,
  size: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): string[] {
  assertChunkingParameters(size, overlap);

  const words = splitWords(text);
  if (words.length === 0) {
    return [];
  }

  const step = size - overlap;
  const chunks: string[] = [];
  let start = 0;

  while (start < words.length) {
    const end = Math.min(start + size, words.length);
    chunks.push(words.slice(start, end).join(" "));
    start += step;
  }

  return chunks;
}

export function toChunks(texts: readonly string[]): Chunk[] {
  return texts.map((text, ordinal) => ({ text, ordinal }));
}

export function assertChunkingParameters(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got ${size}.`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(
      `Chunk overlap must be a non-negative integer, got ${overlap}.`,
    );
  }
  if (overlap >= size) {
    throw new ConfigurationError(
      `Chunk overlap (${overlap}) must be smaller than chunk size (${size}).`,
    );
  }
}
