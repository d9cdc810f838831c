export type EmbeddingErrorCode = 'EMBEDDING_FAILED';

export class EmbeddingError extends Error {
  public readonly code: EmbeddingErrorCode = 'EMBEDDING_FAILED';
  public readonly cause?: Error;

  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = 'EmbeddingError';
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
