export type VectorIndexErrorCode = 'INVALID_BATCH' | 'INVALID_QUERY';

export class VectorIndexError extends Error {
  public readonly code: VectorIndexErrorCode;
  public readonly cause?: Error;

  constructor(
    code: VectorIndexErrorCode,
    message: string,
    options?: { cause?: Error },
  ) {
    super(message);
    this.code = code;
    this.name = 'VectorIndexError';
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
