import {
  BadGatewayException,
  BadRequestException,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Query,
  UnprocessableEntityException,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FileInterceptor } from '@nestjs/platform-express';
import { extname } from 'node:path';
import { parseRequest } from '../common/parse-request.js';
import type { AppConfig, RagConfig } from '../config/index.js';
import { EmbeddingError } from '../embeddings/index.js';
import {
  DocumentIngestionService,
  type IngestionResult,
} from './document-ingestion.service.js';
import {
  documentIdSchema,
  searchDocumentsSchema,
} from './dto/search-documents.dto.js';
import { RetrievalService } from './retrieval.service.js';

export const UPLOAD_EXTENSIONS = ['.pdf', '.txt', '.md', '.docx'];
const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

@Controller('api/v1/documents')
export class DocumentsController {
  private readonly logger = new Logger(DocumentsController.name);

  constructor(
    private readonly ingestion: DocumentIngestionService,
    private readonly retrieval: RetrievalService,
    private readonly configService: ConfigService<AppConfig>,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(
    FileInterceptor('file', { limits: { fileSize: MAX_UPLOAD_BYTES } }),
  )
  async upload(@UploadedFile() file: Express.Multer.File | undefined) {
    if (!file) {
      throw new BadRequestException('file is required');
    }
    const extension = extname(file.originalname).toLowerCase();
    if (!UPLOAD_EXTENSIONS.includes(extension)) {
      throw new BadRequestException(
        `Unsupported file type: ${extension || file.originalname}. Allowed: ${UPLOAD_EXTENSIONS.join(', ')}`,
      );
    }

    const storedPath = await this.ingestion.storeUpload(
      file.originalname,
      file.buffer,
    );

    let result: IngestionResult;
    try {
      result = await this.ingestion.ingest(storedPath, file.originalname);
    } catch (error) {
      if (error instanceof EmbeddingError) {
        this.logger.warn(`Upload ${file.originalname} failed: ${error.message}`);
        throw new BadGatewayException(error.message);
      }
      throw error;
    }

    if (!result.success) {
      throw new UnprocessableEntityException(result.error);
    }
    return result;
  }

  @Get('search')
  async search(@Query() query: unknown) {
    const { q, topK } = parseRequest(searchDocumentsSchema, query);
    const data = await this.retrieval.search(
      q,
      topK ?? this.configService.getOrThrow<RagConfig>('rag').topK,
    );
    return { data };
  }

  @Get('stats')
  async stats() {
    return { chunks: await this.retrieval.count() };
  }

  @Delete(':documentId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('documentId') documentId: string): Promise<void> {
    await this.ingestion.deleteDocument(parseRequest(documentIdSchema, documentId));
  }
}
