import { describe, expect, it } from '@jest/globals';
import { buildSystemPrompt, formatLocalTime } from './prompts.js';

describe('prompts', () => {
  const now = new Date('2025-03-14T14:05:00Z');

  it('formats the time in the configured timezone', () => {
    expect(formatLocalTime(now, 'UTC')).toBe('Friday, 2025-03-14 14:05');
    expect(formatLocalTime(now, 'Europe/Berlin')).toBe('Friday, 2025-03-14 15:05');
  });

  it('ends the system prompt with the current time', () => {
    const prompt = buildSystemPrompt(now, 'Asia/Tokyo');

    expect(prompt.startsWith('You are a personal assistant.')).toBe(true);
    expect(prompt.endsWith('Current time: Friday, 2025-03-14 23:05 (Asia/Tokyo)')).toBe(
      true,
    );
  });
});
