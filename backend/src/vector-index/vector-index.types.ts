export type VectorMetadataValue = string | number | boolean;
export type VectorMetadata = Record<string, VectorMetadataValue>;

export interface VectorRecordBatch {
  ids: string[];
  vectors: number[][];
  texts: string[];
  metadatas: VectorMetadata[];
}

export interface VectorMatch {
  id: string;
  text: string;
  metadata: VectorMetadata;
  /** Cosine distance; smaller is closer. */
  distance: number;
}

/**
 * `where` matches records whose metadata contains every given pair.
 * When both fields are set a record must satisfy both; an empty filter
 * deletes nothing.
 */
export interface VectorDeleteFilter {
  ids?: string[];
  where?: VectorMetadata;
}

export interface VectorIndex {
  add(batch: VectorRecordBatch): Promise<void>;
  query(vectors: number[][], k: number): Promise<VectorMatch[][]>;
  count(): Promise<number>;
  delete(filter: VectorDeleteFilter): Promise<void>;
  /**
   * Removes every record whose metadata contains `where` and adds `batch`
   * as one change: when it fails, the index keeps its previous records.
   */
  replace(where: VectorMetadata, batch: VectorRecordBatch): Promise<void>;
}

export const VECTOR_INDEX = Symbol('VECTOR_INDEX');
