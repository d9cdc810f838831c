import { Inject, Injectable } from '@nestjs/common';
import { AI_PROVIDER_TOKEN } from './ai.constants.js';
import type { AiProvider } from './providers/ai-provider.js';
import type {
  ChatCompletionOptions,
  ChatCompletionResult,
  EmbedTextOptions,
  EmbedTextResult,
  TranscribeAudioOptions,
  TranscribeAudioResult,
} from './ai.types.js';

@Injectable()
export class AIService {
  constructor(
    @Inject(AI_PROVIDER_TOKEN) private readonly provider: AiProvider,
  ) {}

  chat(options: ChatCompletionOptions): Promise<ChatCompletionResult> {
    return this.provider.chat(options);
  }

  embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    return this.provider.embedText(options);
  }

  transcribe(options: TranscribeAudioOptions): Promise<TranscribeAudioResult> {
    return this.provider.transcribe(options);
  }
}
