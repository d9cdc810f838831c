import { describe, expect, it } from '@jest/globals';
import { Test } from '@nestjs/testing';
import { AppController } from './app.controller.js';

describe('AppController', () => {
  it('reports health', async () => {
    const module = await Test.createTestingModule({
      controllers: [AppController],
    }).compile();

    expect(module.get(AppController).health()).toEqual({
      status: 'ok',
      service: 'personal-assistant',
    });
  });
});
