import { Module } from '@nestjs/common';
import { AppController } from './app.controller.js';
import { ChatModule } from './chat/index.js';
import { AppConfigModule } from './config/index.js';
import { DocumentsModule } from './documents/index.js';
import { TranscriptionModule } from './transcription/index.js';

@Module({
  imports: [AppConfigModule, DocumentsModule, ChatModule, TranscriptionModule],
  controllers: [AppController],
})
export class AppModule {}
