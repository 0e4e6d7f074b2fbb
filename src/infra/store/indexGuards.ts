import { DimensionMismatchError } from "../../domain/errors.js";
import { RecordMetadata, VectorRecord } from "../../domain/types.js";

export function assertEmbeddingDimensions(records: VectorRecord[], dimension: number): void {
  for (const record of records) {
    if (record.embedding.length !== dimension) {
      throw new DimensionMismatchError(dimension, record.embedding.length, record.id);
    }
  }
}

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new RangeError(`topK must be a positive integer, got ${topK}.`);
  }
}

export function matchesFilter(
  metadata: RecordMetadata | undefined,
  filter: RecordMetadata,
): boolean {
  if (!metadata) {
    return Object.keys(filter).length === 0;
  }
  return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}
