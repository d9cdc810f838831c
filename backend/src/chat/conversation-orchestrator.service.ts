import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AIService,
  parseToolArguments,
  type AiContentPart,
  type AiMessage,
  type AiUserMessage,
} from '../ai/index.js';
import type { AppConfig, AssistantConfig } from '../config/index.js';
import { ToolRegistry } from '../tools/index.js';
import { buildSystemPrompt } from './prompts.js';

export interface ConversationOptions {
  history?: readonly AiMessage[];
  /** http(s) URL, data URL, or bare base64 JPEG payload. */
  image?: string;
  maxRounds?: number;
}

export type ConversationStopReason = 'answered' | 'round_limit';

export interface ConversationOutcome {
  answer: string;
  messages: AiMessage[];
  rounds: number;
  stopReason: ConversationStopReason;
}

export function toImageUrl(image: string): string {
  return /^(https?:|data:)/.test(image)
    ? image
    : `data:image/jpeg;base64,${image}`;
}

/**
 * Runs the tool-calling loop for one user message: the model either answers
 * or asks for tools, whose results are fed back until it answers or the
 * round budget runs out.
 */
@Injectable()
export class ConversationOrchestrator {
  private readonly logger = new Logger(ConversationOrchestrator.name);

  constructor(
    private readonly aiService: AIService,
    private readonly tools: ToolRegistry,
    private readonly configService: ConfigService<AppConfig>,
  ) {}

  async process(message: string, options: ConversationOptions = {}): Promise<string> {
    const outcome = await this.run(message, options);
    return outcome.answer;
  }

  async run(
    message: string,
    options: ConversationOptions = {},
  ): Promise<ConversationOutcome> {
    const assistant = this.configService.getOrThrow<AssistantConfig>('assistant');
    const maxRounds = options.maxRounds ?? assistant.maxToolRounds;
    if (!Number.isInteger(maxRounds) || maxRounds <= 0) {
      throw new RangeError(`maxRounds must be a positive integer, received ${maxRounds}`);
    }

    const messages: AiMessage[] = [
      { role: 'system', content: buildSystemPrompt(new Date(), assistant.timezone) },
      ...(options.history ?? []),
      this.buildUserMessage(message, options.image),
    ];
    const tools = this.tools.getTools();

    for (let round = 1; round <= maxRounds; round += 1) {
      const reply = await this.aiService.chat({
        messages: messages.slice(),
        tools,
        toolChoice: 'auto',
      });

      messages.push(
        reply.toolCalls.length > 0
          ? { role: 'assistant', content: reply.content, toolCalls: reply.toolCalls }
          : { role: 'assistant', content: reply.content },
      );

      if (reply.toolCalls.length === 0) {
        return { answer: reply.content, messages, rounds: round, stopReason: 'answered' };
      }

      for (const call of reply.toolCalls) {
        const args = parseToolArguments(call.argumentText);
        this.logger.debug(`Round ${round}: executing ${call.name}`);
        const result = await this.tools.execute(call.name, args);
        messages.push({
          role: 'tool',
          content: result,
          toolCallId: call.callId,
          toolName: call.name,
        });
      }
    }

    this.logger.warn(
      `Tool round limit (${maxRounds}) reached; answering with the last tool result`,
    );
    return {
      answer: contentOf(messages[messages.length - 1]),
      messages,
      rounds: maxRounds,
      stopReason: 'round_limit',
    };
  }

  private buildUserMessage(message: string, image?: string): AiUserMessage {
    if (!image) {
      return { role: 'user', content: message };
    }
    const content: AiContentPart[] = [
      { type: 'text', text: message },
      { type: 'image', url: toImageUrl(image) },
    ];
    return { role: 'user', content };
  }
}

function contentOf(message: AiMessage): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content
    .map((part) => (part.type === 'text' ? part.text : ''))
    .join('');
}
