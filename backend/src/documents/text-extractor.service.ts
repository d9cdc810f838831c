import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as mammoth from 'mammoth';
import pdfParse from 'pdf-parse';

@Injectable()
export class TextExtractorService {
  private readonly logger = new Logger(TextExtractorService.name);

  /**
   * Returns the plain text of a document, or an empty string when the format
   * is unsupported or the file cannot be read.
   */
  async extract(filePath: string): Promise<string> {
    const extension = extname(filePath).toLowerCase();
    try {
      switch (extension) {
        case '.pdf': {
          const data = await readFile(filePath);
          const result = await pdfParse(data);
          return result.text;
        }
        case '.docx': {
          const result = await mammoth.extractRawText({ path: filePath });
          return result.value;
        }
        case '.txt':
        case '.md':
        case '.markdown':
          return await readFile(filePath, 'utf-8');
        default:
          this.logger.warn(`Unsupported document format: ${extension || filePath}`);
          return '';
      }
    } catch (error) {
      this.logger.warn(
        `Text extraction failed for ${filePath}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return '';
    }
  }
}
