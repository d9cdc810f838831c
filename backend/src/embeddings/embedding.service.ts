import { Injectable, Logger } from '@nestjs/common';
import { AIService } from '../ai/index.js';
import { EmbeddingError } from './embeddings.errors.js';

/**
 * Turns texts into fixed-length vectors through the configured AI provider.
 *
 * Results are positional: `embed(texts)[i]` belongs to `texts[i]`. Every
 * vector produced by one instance has the same dimensionality; the first
 * successful response fixes it.
 */
@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);
  private dimensions: number | null = null;

  constructor(private readonly aiService: AIService) {}

  get dimension(): number | null {
    return this.dimensions;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let embeddings: number[][];
    try {
      ({ embeddings } = await this.aiService.embedText({ inputs: texts }));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Embedding ${texts.length} text(s) failed: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new EmbeddingError(
        `Embedding failed: ${message}`,
        error instanceof Error ? { cause: error } : undefined,
      );
    }

    if (embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding failed: expected ${texts.length} vectors, received ${embeddings.length}`,
      );
    }

    const expected = this.dimensions ?? embeddings[0].length;
    const mismatch = embeddings.find((vector) => vector.length !== expected);
    if (mismatch) {
      throw new EmbeddingError(
        `Embedding failed: dimension ${mismatch.length} does not match ${expected}`,
      );
    }

    this.dimensions = expected;
    return embeddings;
  }

  async embedOne(text: string): Promise<number[]> {
    const [vector] = await this.embed([text]);
    return vector;
  }
}
