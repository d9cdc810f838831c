export type AiGatewayErrorCode =
  | 'AI_CHAT_FAILED'
  | 'AI_EMBEDDING_FAILED'
  | 'AI_TRANSCRIPTION_FAILED';

export class AiGatewayError extends Error {
  public readonly code: AiGatewayErrorCode;
  public readonly cause?: Error;

  constructor(
    code: AiGatewayErrorCode,
    message: string,
    options?: { cause?: Error },
  ) {
    super(message);
    this.code = code;
    this.name = 'AiGatewayError';
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
