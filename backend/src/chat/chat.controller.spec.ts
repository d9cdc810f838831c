import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { BadRequestException, InternalServerErrorException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { CHAT_FAILURE_MESSAGE, ChatController } from './chat.controller.js';
import { ConversationOrchestrator } from './conversation-orchestrator.service.js';

type ProcessFn = ConversationOrchestrator['process'];

describe('ChatController', () => {
  let processMessage: jest.MockedFunction<ProcessFn>;
  let nodeEnv: string;

  const createController = async () => {
    const module = await Test.createTestingModule({
      controllers: [ChatController],
      providers: [
        { provide: ConversationOrchestrator, useValue: { process: processMessage } },
        {
          provide: ConfigService,
          useValue: { getOrThrow: () => ({ nodeEnv, port: 3000 }) },
        },
      ],
    }).compile();
    return module.get(ChatController);
  };

  const failureBody = async (controller: ChatController): Promise<unknown> => {
    try {
      await controller.chat({ message: 'Hi' });
    } catch (error) {
      expect(error).toBeInstanceOf(InternalServerErrorException);
      if (error instanceof InternalServerErrorException) {
        return error.getResponse();
      }
    }
    throw new Error('expected the request to fail');
  };

  beforeEach(() => {
    processMessage = jest.fn<ProcessFn>();
    nodeEnv = 'development';
  });

  it('answers with the assistant response', async () => {
    processMessage.mockResolvedValue('Hello!');
    const controller = await createController();

    await expect(
      controller.chat({
        message: 'Hi',
        history: [{ role: 'user', content: 'Earlier question' }],
      }),
    ).resolves.toEqual({ response: 'Hello!' });
    expect(processMessage).toHaveBeenCalledWith('Hi', {
      history: [{ role: 'user', content: 'Earlier question' }],
      image: undefined,
    });
  });

  it('rejects an empty message', async () => {
    const controller = await createController();

    await expect(controller.chat({ message: '   ' })).rejects.toBeInstanceOf(
      BadRequestException,
    );
    expect(processMessage).not.toHaveBeenCalled();
  });

  it('includes the failure detail outside production', async () => {
    processMessage.mockRejectedValue(new Error('model unavailable'));
    const controller = await createController();

    await expect(failureBody(controller)).resolves.toMatchObject({
      error: {
        code: 'CHAT_INTERNAL_ERROR',
        message: CHAT_FAILURE_MESSAGE,
        detail: 'model unavailable',
      },
    });
  });

  it('hides the failure detail in production', async () => {
    nodeEnv = 'production';
    processMessage.mockRejectedValue(new Error('model unavailable'));
    const controller = await createController();

    const body = await failureBody(controller);

    expect(body).toEqual({
      error: {
        code: 'CHAT_INTERNAL_ERROR',
        message: CHAT_FAILURE_MESSAGE,
        requestId: expect.any(String),
      },
    });
  });
});
