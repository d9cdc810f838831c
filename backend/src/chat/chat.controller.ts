import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  Post,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { parseRequest } from '../common/parse-request.js';
import type { AppConfig } from '../config/index.js';
import { ConversationOrchestrator } from './conversation-orchestrator.service.js';
import { chatRequestSchema } from './dto/chat-request.dto.js';

export const CHAT_FAILURE_MESSAGE = 'Assistant request failed. Please try again.';

@Controller('api/v1/chat')
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(
    private readonly orchestrator: ConversationOrchestrator,
    private readonly configService: ConfigService<AppConfig>,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async chat(@Body() body: unknown): Promise<{ response: string }> {
    const payload = parseRequest(chatRequestSchema, body);
    const requestId = randomUUID();
    this.logger.debug(
      `Chat request ${requestId} started (history=${payload.history.length}, image=${payload.image ? 'yes' : 'no'})`,
    );

    try {
      const response = await this.orchestrator.process(payload.message, {
        history: payload.history,
        image: payload.image,
      });
      return { response };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Chat request ${requestId} failed: ${detail}`,
        error instanceof Error ? error.stack : undefined,
      );

      const { nodeEnv } = this.configService.getOrThrow<AppConfig['app']>('app');
      throw new InternalServerErrorException({
        error: {
          code: 'CHAT_INTERNAL_ERROR',
          message: CHAT_FAILURE_MESSAGE,
          requestId,
          ...(nodeEnv === 'production' ? {} : { detail }),
        },
      });
    }
  }
}
