import type {
  ChatCompletionOptions,
  ChatCompletionResult,
  EmbedTextOptions,
  EmbedTextResult,
  TranscribeAudioOptions,
  TranscribeAudioResult,
} from '../ai.types.js';

export interface AiProvider {
  readonly name: string;
  chat(options: ChatCompletionOptions): Promise<ChatCompletionResult>;
  embedText(options: EmbedTextOptions): Promise<EmbedTextResult>;
  transcribe(options: TranscribeAudioOptions): Promise<TranscribeAudioResult>;
}
