import {
  assertReplaceFilter,
  assertValidBatch,
  assertValidK,
} from '../vector-batch.js';
import type {
  VectorDeleteFilter,
  VectorIndex,
  VectorMatch,
  VectorMetadata,
  VectorRecordBatch,
} from '../vector-index.types.js';

interface StoredRecord {
  id: string;
  vector: number[];
  text: string;
  metadata: VectorMetadata;
}

/** Process-local `VectorIndex` ranking by cosine distance. Used by specs. */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly records = new Map<string, StoredRecord>();

  async add(batch: VectorRecordBatch): Promise<void> {
    assertValidBatch(batch);
    this.write(batch);
  }

  async query(vectors: number[][], k: number): Promise<VectorMatch[][]> {
    assertValidK(k);
    return vectors.map((vector) =>
      [...this.records.values()]
        .map((record) => ({
          id: record.id,
          text: record.text,
          metadata: { ...record.metadata },
          distance: cosineDistance(vector, record.vector),
        }))
        .sort((a, b) => a.distance - b.distance)
        .slice(0, k),
    );
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async delete(filter: VectorDeleteFilter): Promise<void> {
    const { ids, where } = filter;
    if (!ids && !where) {
      return;
    }
    for (const record of [...this.records.values()]) {
      const idMatches = !ids || ids.includes(record.id);
      if (idMatches && (!where || containsAll(record.metadata, where))) {
        this.records.delete(record.id);
      }
    }
  }

  async replace(where: VectorMetadata, batch: VectorRecordBatch): Promise<void> {
    assertReplaceFilter(where);
    assertValidBatch(batch);
    for (const record of [...this.records.values()]) {
      if (containsAll(record.metadata, where)) {
        this.records.delete(record.id);
      }
    }
    this.write(batch);
  }

  ids(): string[] {
    return [...this.records.keys()];
  }

  private write(batch: VectorRecordBatch): void {
    batch.ids.forEach((id, i) => {
      this.records.set(id, {
        id,
        vector: batch.vectors[i],
        text: batch.texts[i],
        metadata: { ...batch.metadatas[i] },
      });
    });
  }
}

function containsAll(metadata: VectorMetadata, where: VectorMetadata): boolean {
  return Object.entries(where).every(([key, value]) => metadata[key] === value);
}

function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 1;
  }
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
