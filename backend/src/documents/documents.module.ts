import { Module } from '@nestjs/common';
import { EmbeddingsModule } from '../embeddings/index.js';
import { VectorIndexModule } from '../vector-index/index.js';
import { DocumentIngestionService } from './document-ingestion.service.js';
import { DocumentsController } from './documents.controller.js';
import { RetrievalService } from './retrieval.service.js';
import { TextExtractorService } from './text-extractor.service.js';

@Module({
  imports: [EmbeddingsModule, VectorIndexModule],
  providers: [TextExtractorService, DocumentIngestionService, RetrievalService],
  controllers: [DocumentsController],
  exports: [DocumentIngestionService, RetrievalService],
})
export class DocumentsModule {}
