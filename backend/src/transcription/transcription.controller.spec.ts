import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { BadGatewayException, BadRequestException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { Readable } from 'node:stream';
import { AIService, AiGatewayError } from '../ai/index.js';
import { TranscriptionController } from './transcription.controller.js';

type TranscribeFn = AIService['transcribe'];

const audioFile = (content: Buffer): Express.Multer.File => ({
  fieldname: 'file',
  originalname: 'memo.m4a',
  encoding: '7bit',
  mimetype: 'audio/mp4',
  size: content.length,
  buffer: content,
  stream: Readable.from([]),
  destination: '',
  filename: '',
  path: '',
});

describe('TranscriptionController', () => {
  let controller: TranscriptionController;
  let transcribe: jest.MockedFunction<TranscribeFn>;

  beforeEach(async () => {
    transcribe = jest.fn<TranscribeFn>(async () => ({
      text: 'Remind me to call the dentist.',
      language: 'english',
    }));

    const module = await Test.createTestingModule({
      controllers: [TranscriptionController],
      providers: [{ provide: AIService, useValue: { transcribe } }],
    }).compile();

    controller = module.get(TranscriptionController);
  });

  it('returns the transcribed text', async () => {
    const content = Buffer.from('fake-audio');

    await expect(controller.transcribe(audioFile(content))).resolves.toEqual({
      text: 'Remind me to call the dentist.',
    });
    expect(transcribe).toHaveBeenCalledWith({
      audio: content,
      fileName: 'memo.m4a',
    });
  });

  it('requires a file', async () => {
    await expect(controller.transcribe(undefined)).rejects.toThrow(
      new BadRequestException('file is required'),
    );
  });

  it('rejects an empty file without calling the model', async () => {
    await expect(
      controller.transcribe(audioFile(Buffer.alloc(0))),
    ).rejects.toThrow(new BadRequestException('Empty file'));
    expect(transcribe).not.toHaveBeenCalled();
  });

  it('maps gateway failures to 502', async () => {
    transcribe.mockRejectedValueOnce(
      new AiGatewayError('AI_TRANSCRIPTION_FAILED', 'Transcription request failed: timeout'),
    );

    await expect(
      controller.transcribe(audioFile(Buffer.from('fake-audio'))),
    ).rejects.toBeInstanceOf(BadGatewayException);
  });
});
