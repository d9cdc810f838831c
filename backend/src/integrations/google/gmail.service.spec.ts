import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  GMAIL_SEND_URL,
  GmailService,
  buildMimeMessage,
  encodeHeaderValue,
} from './gmail.service.js';
import { GoogleCredentialsService } from './google-credentials.service.js';

type GetAccessTokenFn = GoogleCredentialsService['getAccessToken'];

describe('buildMimeMessage', () => {
  it('builds a base64 plain-text message', () => {
    expect(
      buildMimeMessage({ to: 'friend@example.com', subject: 'Hi', body: 'Hello' }),
    ).toBe(
      [
        'To: friend@example.com',
        'Subject: Hi',
        'MIME-Version: 1.0',
        'Content-Type: text/plain; charset="UTF-8"',
        'Content-Transfer-Encoding: base64',
        '',
        'SGVsbG8=',
      ].join('\r\n'),
    );
  });

  it('encodes non-ASCII subjects and strips header line breaks', () => {
    expect(encodeHeaderValue('Café')).toBe('=?UTF-8?B?Q2Fmw6k=?=');
    expect(encodeHeaderValue('Hi\r\nBcc: someone@example.com')).toBe(
      'Hi Bcc: someone@example.com',
    );
  });
});

describe('GmailService', () => {
  let service: GmailService;
  let getAccessToken: jest.MockedFunction<GetAccessTokenFn>;

  beforeEach(async () => {
    getAccessToken = jest.fn<GetAccessTokenFn>(async () => 'test-token');

    const module = await Test.createTestingModule({
      providers: [
        GmailService,
        { provide: GoogleCredentialsService, useValue: { getAccessToken } },
        {
          provide: ConfigService,
          useValue: {
            getOrThrow: () => ({
              timeoutMs: 1000,
              google: {
                calendarTokenPath: 'config/token_calendar.json',
                gmailTokenPath: 'config/token_gmail.json',
              },
              notes: { folder: 'Notes' },
            }),
          },
        },
      ],
    }).compile();

    service = module.get(GmailService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reports a missing authorization', async () => {
    getAccessToken.mockResolvedValue(null);

    await expect(
      service.sendMessage({ to: 'friend@example.com', subject: 'Hi', body: 'Hello' }),
    ).resolves.toEqual({
      success: false,
      error:
        'Gmail is not authorized. Provide a valid OAuth token at config/token_gmail.json.',
    });
  });

  it('sends the encoded message', async () => {
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(
        new Response(JSON.stringify({ id: 'msg-1', threadId: 'thread-1' }), {
          status: 200,
        }),
      );
    const input = { to: 'friend@example.com', subject: 'Hi', body: 'Hello' };

    await expect(service.sendMessage(input)).resolves.toEqual({
      success: true,
      messageId: 'msg-1',
      threadId: 'thread-1',
    });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(GMAIL_SEND_URL);
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });
    expect(init?.body).toBe(
      JSON.stringify({
        raw: Buffer.from(buildMimeMessage(input), 'utf-8').toString('base64url'),
      }),
    );
  });

  it('surfaces Google API errors', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(JSON.stringify({ error: { message: 'Invalid Credentials' } }), {
        status: 401,
      }),
    );

    await expect(
      service.sendMessage({ to: 'friend@example.com', subject: 'Hi', body: 'Hello' }),
    ).resolves.toEqual({
      success: false,
      error: 'Gmail API error (401): Invalid Credentials',
    });
  });
});
