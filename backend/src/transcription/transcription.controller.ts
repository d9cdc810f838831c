import {
  BadGatewayException,
  BadRequestException,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { AIService, AiGatewayError } from '../ai/index.js';

// Largest upload the Whisper API accepts
const MAX_AUDIO_BYTES = 25 * 1024 * 1024;

@Controller('api/v1/transcribe')
export class TranscriptionController {
  private readonly logger = new Logger(TranscriptionController.name);

  constructor(private readonly aiService: AIService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(
    FileInterceptor('file', { limits: { fileSize: MAX_AUDIO_BYTES } }),
  )
  async transcribe(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<{ text: string }> {
    if (!file) {
      throw new BadRequestException('file is required');
    }
    if (file.buffer.length === 0) {
      throw new BadRequestException('Empty file');
    }

    try {
      const result = await this.aiService.transcribe({
        audio: file.buffer,
        fileName: file.originalname,
      });
      this.logger.debug(
        `Transcribed ${file.originalname} (${file.buffer.length} bytes)`,
      );
      return { text: result.text };
    } catch (error) {
      if (error instanceof AiGatewayError) {
        this.logger.warn(`Transcription of ${file.originalname} failed: ${error.message}`);
        throw new BadGatewayException('Transcription failed');
      }
      throw error;
    }
  }
}
