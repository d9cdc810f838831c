import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import type { AppConfig, IntegrationsConfig } from '../../config/index.js';
import { failure, type IntegrationResult } from '../integration.types.js';
import { describeGoogleError, postGoogleJson } from './google-api.js';
import { GoogleCredentialsService } from './google-credentials.service.js';

export const GMAIL_SEND_URL =
  'https://gmail.googleapis.com/gmail/v1/users/me/messages/send';

export interface EmailInput {
  to: string;
  subject: string;
  body: string;
}

const sentMessageSchema = z.object({
  id: z.string(),
  threadId: z.string().optional(),
});

export type EmailResult = IntegrationResult<{
  messageId: string;
  threadId?: string;
}>;

// Header values must not carry line breaks
function headerValue(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').trim();
}

/** RFC 2047 encoded-word for header values outside printable ASCII. */
export function encodeHeaderValue(value: string): string {
  const clean = headerValue(value);
  if (/^[\x20-\x7e]*$/.test(clean)) {
    return clean;
  }
  return `=?UTF-8?B?${Buffer.from(clean, 'utf-8').toString('base64')}?=`;
}

export function buildMimeMessage(input: EmailInput): string {
  return [
    `To: ${headerValue(input.to)}`,
    `Subject: ${encodeHeaderValue(input.subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: base64',
    '',
    Buffer.from(input.body, 'utf-8').toString('base64'),
  ].join('\r\n');
}

@Injectable()
export class GmailService {
  private readonly logger = new Logger(GmailService.name);

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    private readonly credentials: GoogleCredentialsService,
  ) {}

  async sendMessage(input: EmailInput): Promise<EmailResult> {
    const integrations =
      this.configService.getOrThrow<IntegrationsConfig>('integrations');
    const tokenPath = integrations.google.gmailTokenPath;
    const accessToken = await this.credentials.getAccessToken(tokenPath);
    if (!accessToken) {
      return failure(
        `Gmail is not authorized. Provide a valid OAuth token at ${tokenPath}.`,
      );
    }

    const raw = Buffer.from(buildMimeMessage(input), 'utf-8').toString(
      'base64url',
    );

    try {
      const response = await postGoogleJson(
        GMAIL_SEND_URL,
        accessToken,
        { raw },
        integrations.timeoutMs,
      );

      if (!response.ok) {
        this.logger.warn(`Gmail send failed (${response.status}): ${response.text}`);
        return failure(
          `Gmail API error (${response.status}): ${describeGoogleError(response)}`,
        );
      }

      const message = sentMessageSchema.safeParse(response.body);
      if (!message.success) {
        return failure('Gmail returned an unexpected response');
      }

      this.logger.log(`Sent email ${message.data.id}`);
      return {
        success: true,
        messageId: message.data.id,
        threadId: message.data.threadId,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Gmail request failed: ${message}`);
      return failure(`Gmail request failed: ${message}`);
    }
  }
}
