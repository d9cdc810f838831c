import { Injectable, Logger } from '@nestjs/common';
import { createOpenAI } from '@ai-sdk/openai';
import {
  embedMany,
  experimental_transcribe as transcribeAudio,
  generateText as aiGenerateText,
} from 'ai';
import type { AiConfig } from '../../config/index.js';
import { AiGatewayError } from '../ai.errors.js';
import type {
  ChatCompletionOptions,
  ChatCompletionResult,
  EmbedTextOptions,
  EmbedTextResult,
  TranscribeAudioOptions,
  TranscribeAudioResult,
} from '../ai.types.js';
import type { AiProvider } from './ai-provider.js';
import {
  fromSdkToolCall,
  toModelMessages,
  toToolSet,
} from './model-messages.js';

type GenerateTextParams = Parameters<typeof aiGenerateText>[0];
type EmbedManyParams = Parameters<typeof embedMany>[0];
type TranscribeParams = Parameters<typeof transcribeAudio>[0];

@Injectable()
export class OpenAiProvider implements AiProvider {
  public readonly name = 'openai';

  private readonly logger = new Logger(OpenAiProvider.name);
  private readonly client: ReturnType<typeof createOpenAI>;

  constructor(private readonly config: AiConfig['openai']) {
    this.client = this.createClient();
    this.logger.log(
      `OpenAI provider initialized with chat model: ${this.resolveChatModel()}, embedding model: ${this.resolveEmbeddingModel()}, transcription model: ${this.resolveTranscriptionModel()}`,
    );
  }

  async chat(options: ChatCompletionOptions): Promise<ChatCompletionResult> {
    try {
      const generateOptions: GenerateTextParams = {
        model: this.getChatModel(options.model),
        messages: toModelMessages(options.messages),
      };

      if (options.temperature !== undefined) {
        generateOptions.temperature = options.temperature;
      }
      if (options.maxTokens !== undefined) {
        generateOptions.maxOutputTokens = options.maxTokens;
      }
      // Tools carry no execute(), so the SDK hands the calls back instead of running them
      if (options.tools && options.tools.length > 0) {
        generateOptions.tools = toToolSet(options.tools);
        generateOptions.toolChoice = options.toolChoice ?? 'auto';
      }

      const result = await aiGenerateText(generateOptions);

      return {
        role: 'assistant',
        content: result.text,
        toolCalls: result.toolCalls.map(fromSdkToolCall),
        finishReason: result.finishReason ?? null,
        raw: result,
      };
    } catch (error) {
      this.logger.error(
        'OpenAI chat completion failed',
        error instanceof Error ? error.stack : error,
      );
      throw new AiGatewayError(
        'AI_CHAT_FAILED',
        `Language model request failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error instanceof Error ? { cause: error } : undefined,
      );
    }
  }

  async embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    try {
      const embeddingOptions: EmbedManyParams = {
        model: this.getEmbeddingModel(options.model),
        values: options.inputs,
      };
      const result = await embedMany(embeddingOptions);

      return {
        embeddings: result.embeddings.map((embedding) => Array.from(embedding)),
        raw: result,
      };
    } catch (error) {
      this.logger.error(
        'OpenAI embedding failed',
        error instanceof Error ? error.stack : error,
      );
      throw new AiGatewayError(
        'AI_EMBEDDING_FAILED',
        `Embedding request failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error instanceof Error ? { cause: error } : undefined,
      );
    }
  }

  async transcribe(
    options: TranscribeAudioOptions,
  ): Promise<TranscribeAudioResult> {
    try {
      const result = await transcribeAudio({
        model: this.getTranscriptionModel(options.model),
        audio: options.audio,
      });

      return {
        text: result.text,
        language: result.language,
        raw: result,
      };
    } catch (error) {
      this.logger.error(
        `OpenAI transcription failed${options.fileName ? ` for ${options.fileName}` : ''}`,
        error instanceof Error ? error.stack : error,
      );
      throw new AiGatewayError(
        'AI_TRANSCRIPTION_FAILED',
        `Transcription request failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error instanceof Error ? { cause: error } : undefined,
      );
    }
  }

  private resolveChatModel(model?: string) {
    return model ?? this.config.chatModel ?? 'gpt-4o-mini';
  }

  private resolveEmbeddingModel(model?: string) {
    return model ?? this.config.embeddingModel ?? 'text-embedding-3-small';
  }

  private resolveTranscriptionModel(model?: string) {
    return model ?? this.config.transcriptionModel ?? 'whisper-1';
  }

  private getChatModel(model?: string): GenerateTextParams['model'] {
    const modelName = this.resolveChatModel(model);
    return this.client(modelName);
  }

  private getEmbeddingModel(model?: string): EmbedManyParams['model'] {
    const modelName = this.resolveEmbeddingModel(model);
    return this.client.embedding(modelName);
  }

  private getTranscriptionModel(model?: string): TranscribeParams['model'] {
    return this.client.transcription(this.resolveTranscriptionModel(model));
  }

  private createClient() {
    if (!this.config.apiKey) {
      throw new Error('OpenAI API key is not configured');
    }

    return createOpenAI({
      apiKey: this.config.apiKey,
    });
  }
}
