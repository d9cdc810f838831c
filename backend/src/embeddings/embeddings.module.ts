import { Module } from '@nestjs/common';
import { AiModule } from '../ai/index.js';
import { EmbeddingService } from './embedding.service.js';

@Module({
  imports: [AiModule],
  providers: [EmbeddingService],
  exports: [EmbeddingService],
})
export class EmbeddingsModule {}
