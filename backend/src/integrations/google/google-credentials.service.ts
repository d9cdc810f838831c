import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

// Stored OAuth token as written by the Google auth libraries
const storedTokenSchema = z
  .object({
    token: z.string().min(1).optional(),
    access_token: z.string().min(1).optional(),
    expiry: z.string().optional(),
    expiry_date: z.number().optional(),
  })
  .passthrough();

type StoredToken = z.infer<typeof storedTokenSchema>;

/**
 * Reads bearer tokens from stored OAuth token files. Acquiring and refreshing
 * tokens happens outside this service; a missing or expired token is `null`.
 */
@Injectable()
export class GoogleCredentialsService {
  private readonly logger = new Logger(GoogleCredentialsService.name);

  async getAccessToken(
    tokenPath: string,
    now: Date = new Date(),
  ): Promise<string | null> {
    let raw: string;
    try {
      raw = await readFile(tokenPath, 'utf-8');
    } catch (error) {
      this.logger.warn(
        `Google token file unavailable at ${tokenPath}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn(`Google token file at ${tokenPath} is not valid JSON`);
      return null;
    }

    const result = storedTokenSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(`Google token file at ${tokenPath} has an unexpected shape`);
      return null;
    }

    const accessToken = result.data.token ?? result.data.access_token;
    if (!accessToken) {
      this.logger.warn(`Google token file at ${tokenPath} holds no access token`);
      return null;
    }

    const expiresAt = resolveExpiry(result.data);
    if (expiresAt !== null && expiresAt <= now.getTime()) {
      this.logger.warn(`Google token at ${tokenPath} expired`);
      return null;
    }

    return accessToken;
  }
}

function resolveExpiry(token: StoredToken): number | null {
  if (token.expiry_date !== undefined) {
    return token.expiry_date;
  }
  if (token.expiry) {
    // Naive timestamps are UTC
    const iso = /(?:[zZ]|[+-]\d{2}:?\d{2})$/.test(token.expiry)
      ? token.expiry
      : `${token.expiry}Z`;
    const parsed = Date.parse(iso);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}
