import { VectorIndexError } from './vector-index.errors.js';
import type { VectorMetadata, VectorRecordBatch } from './vector-index.types.js';

export function assertValidBatch(batch: VectorRecordBatch): void {
  const { ids, vectors, texts, metadatas } = batch;
  if (
    vectors.length !== ids.length ||
    texts.length !== ids.length ||
    metadatas.length !== ids.length
  ) {
    throw new VectorIndexError(
      'INVALID_BATCH',
      `Batch arrays differ in length (ids=${ids.length}, vectors=${vectors.length}, texts=${texts.length}, metadatas=${metadatas.length})`,
    );
  }

  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      throw new VectorIndexError('INVALID_BATCH', `Duplicate id in batch: ${id}`);
    }
    seen.add(id);
  }
}

export function assertReplaceFilter(where: VectorMetadata): void {
  if (Object.keys(where).length === 0) {
    throw new VectorIndexError(
      'INVALID_BATCH',
      'replace needs at least one metadata key to match',
    );
  }
}

export function assertValidK(k: number): void {
  if (!Number.isInteger(k) || k <= 0) {
    throw new VectorIndexError(
      'INVALID_QUERY',
      `k must be a positive integer, received ${k}`,
    );
  }
}

export function toVectorLiteral(values: number[]): string {
  return `[${values.join(',')}]`;
}

export function toVectorMetadata(value: unknown): VectorMetadata {
  const metadata: VectorMetadata = {};
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return metadata;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (
      typeof entry === 'string' ||
      typeof entry === 'number' ||
      typeof entry === 'boolean'
    ) {
      metadata[key] = entry;
    }
  }
  return metadata;
}
