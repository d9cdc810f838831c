import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { access, mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { AppConfig, RagConfig } from '../config/index.js';
import { EmbeddingService } from '../embeddings/index.js';
import { VECTOR_INDEX, type VectorIndex } from '../vector-index/index.js';
import { chunkText } from './chunker.js';
import { TextExtractorService } from './text-extractor.service.js';

export type IngestionResult =
  | { success: true; documentId: string; chunks: number; source: string }
  | { success: false; error: string; source: string };

const MAX_DOCUMENT_ID_LENGTH = 80;

/** Derives the stable document id from a file name: its sanitized stem. */
export function safeDocumentId(fileName: string): string {
  const name = basename(fileName);
  const stem = name.slice(0, name.length - extname(name).length);
  const sanitized = stem
    .replace(/[^A-Za-z0-9_-]/g, '_')
    .slice(0, MAX_DOCUMENT_ID_LENGTH);
  return sanitized || 'doc';
}

@Injectable()
export class DocumentIngestionService {
  private readonly logger = new Logger(DocumentIngestionService.name);

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    private readonly extractor: TextExtractorService,
    private readonly embeddings: EmbeddingService,
    @Inject(VECTOR_INDEX) private readonly index: VectorIndex,
  ) {}

  /**
   * Extracts, chunks and embeds a file, then replaces whatever the index
   * held for the same document id in one step. When embedding or the write
   * fails, the previous chunks stay in place.
   */
  async ingest(filePath: string, originalName?: string): Promise<IngestionResult> {
    const source = basename(originalName ?? filePath);

    try {
      await access(filePath);
    } catch {
      return { success: false, error: `File not found: ${filePath}`, source };
    }

    const rag = this.getRagConfig();
    const text = await this.extractor.extract(filePath);
    const chunks = chunkText(text, {
      chunkSize: rag.chunkSize,
      overlap: rag.chunkOverlap,
    });
    if (chunks.length === 0) {
      this.logger.warn(`No text extracted from ${source}`);
      return { success: false, error: 'No text extracted from document', source };
    }

    const documentId = safeDocumentId(source);
    const vectors = await this.embeddings.embed(chunks.map((chunk) => chunk.text));

    await this.index.replace({ documentId }, {
      ids: chunks.map((chunk) => `${documentId}_${chunk.index}`),
      vectors,
      texts: chunks.map((chunk) => chunk.text),
      metadatas: chunks.map((chunk) => ({
        documentId,
        source,
        chunkIndex: chunk.index,
      })),
    });

    this.logger.log(`Ingested ${source} as ${documentId} (${chunks.length} chunks)`);
    return { success: true, documentId, chunks: chunks.length, source };
  }

  /** Saves uploaded bytes under the documents directory and returns the path. */
  async storeUpload(
    originalName: string,
    content: Buffer,
    now: Date = new Date(),
  ): Promise<string> {
    const directory = this.getRagConfig().documentsDir;
    await mkdir(directory, { recursive: true });

    const extension = extname(basename(originalName)).toLowerCase();
    const seconds = Math.floor(now.getTime() / 1000);
    const filePath = join(
      directory,
      `${safeDocumentId(originalName)}_${seconds}${extension}`,
    );
    await writeFile(filePath, content);
    return filePath;
  }

  async deleteDocument(documentId: string): Promise<void> {
    await this.index.delete({ where: { documentId } });
    this.logger.log(`Deleted chunks of ${documentId}`);
  }

  private getRagConfig(): RagConfig {
    return this.configService.getOrThrow<RagConfig>('rag');
  }
}
