import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { GoogleCredentialsService } from './google-credentials.service.js';

describe('GoogleCredentialsService', () => {
  const now = new Date('2025-03-14T12:00:00Z');
  const service = new GoogleCredentialsService();
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'google-token-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const writeToken = async (content: string) => {
    const tokenPath = join(directory, 'token.json');
    await writeFile(tokenPath, content);
    return tokenPath;
  };

  it('returns a token that has not expired', async () => {
    const tokenPath = await writeToken(
      JSON.stringify({ token: 'test-token', expiry: '2025-03-14T13:00:00' }),
    );

    await expect(service.getAccessToken(tokenPath, now)).resolves.toBe(
      'test-token',
    );
  });

  it('accepts access_token with a millisecond expiry', async () => {
    const tokenPath = await writeToken(
      JSON.stringify({
        access_token: 'test-token',
        expiry_date: now.getTime() + 60_000,
      }),
    );

    await expect(service.getAccessToken(tokenPath, now)).resolves.toBe(
      'test-token',
    );
  });

  it('treats an expired token as missing', async () => {
    const tokenPath = await writeToken(
      JSON.stringify({ token: 'test-token', expiry: '2025-03-14T11:59:59Z' }),
    );

    await expect(service.getAccessToken(tokenPath, now)).resolves.toBeNull();
  });

  it('returns null for a missing file', async () => {
    await expect(
      service.getAccessToken(join(directory, 'absent.json'), now),
    ).resolves.toBeNull();
  });

  it('returns null for malformed content', async () => {
    const tokenPath = await writeToken('{not json');

    await expect(service.getAccessToken(tokenPath, now)).resolves.toBeNull();
  });
});
