import { Module } from '@nestjs/common';
import { AiModule } from '../ai/index.js';
import { TranscriptionController } from './transcription.controller.js';

@Module({
  imports: [AiModule],
  controllers: [TranscriptionController],
})
export class TranscriptionModule {}
