import { Inject, Injectable, Logger } from '@nestjs/common';
import { EmbeddingService } from '../embeddings/index.js';
import {
  VECTOR_INDEX,
  type VectorIndex,
  type VectorMetadata,
} from '../vector-index/index.js';

export interface RetrievedChunk {
  id: string;
  text: string;
  metadata: VectorMetadata;
}

export const DEFAULT_TOP_K = 5;

@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(
    private readonly embeddings: EmbeddingService,
    @Inject(VECTOR_INDEX) private readonly index: VectorIndex,
  ) {}

  async search(query: string, topK = DEFAULT_TOP_K): Promise<RetrievedChunk[]> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new RangeError(`topK must be a positive integer, received ${topK}`);
    }

    if ((await this.index.count()) === 0) {
      return [];
    }

    const vector = await this.embeddings.embedOne(query);
    const [matches = []] = await this.index.query([vector], topK);
    this.logger.debug(`Query matched ${matches.length} chunk(s)`);

    return matches.map(({ id, text, metadata }) => ({ id, text, metadata }));
  }

  /** Renders search results as the JSON payload of the search_documents tool. */
  async searchAsToolResult(query: string, topK = DEFAULT_TOP_K): Promise<string> {
    const chunks = await this.search(query, topK);
    return JSON.stringify({
      results: chunks.map((chunk) => ({
        content: chunk.text,
        source: chunk.metadata.source ?? 'unknown',
      })),
    });
  }

  count(): Promise<number> {
    return this.index.count();
  }
}
