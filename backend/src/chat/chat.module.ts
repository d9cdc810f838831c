import { Module } from '@nestjs/common';
import { AiModule } from '../ai/index.js';
import { ToolsModule } from '../tools/index.js';
import { ChatController } from './chat.controller.js';
import { ConversationOrchestrator } from './conversation-orchestrator.service.js';

@Module({
  imports: [AiModule, ToolsModule],
  providers: [ConversationOrchestrator],
  controllers: [ChatController],
  exports: [ConversationOrchestrator],
})
export class ChatModule {}
