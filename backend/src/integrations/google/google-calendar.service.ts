import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import type {
  AppConfig,
  AssistantConfig,
  IntegrationsConfig,
} from '../../config/index.js';
import { failure, type IntegrationResult } from '../integration.types.js';
import { describeGoogleError, postGoogleJson } from './google-api.js';
import { GoogleCredentialsService } from './google-credentials.service.js';

export const CALENDAR_EVENTS_URL =
  'https://www.googleapis.com/calendar/v3/calendars/primary/events';

export interface CalendarEventInput {
  title: string;
  start_time: string;
  end_time: string;
  description?: string;
}

const createdEventSchema = z.object({
  id: z.string(),
  htmlLink: z.string().optional(),
});

export type CalendarEventResult = IntegrationResult<{
  eventId: string;
  htmlLink?: string;
}>;

@Injectable()
export class GoogleCalendarService {
  private readonly logger = new Logger(GoogleCalendarService.name);

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    private readonly credentials: GoogleCredentialsService,
  ) {}

  async addEvent(input: CalendarEventInput): Promise<CalendarEventResult> {
    const integrations =
      this.configService.getOrThrow<IntegrationsConfig>('integrations');
    const { timezone } =
      this.configService.getOrThrow<AssistantConfig>('assistant');

    const tokenPath = integrations.google.calendarTokenPath;
    const accessToken = await this.credentials.getAccessToken(tokenPath);
    if (!accessToken) {
      return failure(
        `Google Calendar is not authorized. Provide a valid OAuth token at ${tokenPath}.`,
      );
    }

    try {
      const response = await postGoogleJson(
        CALENDAR_EVENTS_URL,
        accessToken,
        {
          summary: input.title,
          description: input.description ?? '',
          start: { dateTime: input.start_time, timeZone: timezone },
          end: { dateTime: input.end_time, timeZone: timezone },
        },
        integrations.timeoutMs,
      );

      if (!response.ok) {
        this.logger.warn(
          `Calendar event creation failed (${response.status}): ${response.text}`,
        );
        return failure(
          `Google Calendar API error (${response.status}): ${describeGoogleError(response)}`,
        );
      }

      const event = createdEventSchema.safeParse(response.body);
      if (!event.success) {
        return failure('Google Calendar returned an unexpected response');
      }

      this.logger.log(`Created calendar event ${event.data.id}`);
      return {
        success: true,
        eventId: event.data.id,
        htmlLink: event.data.htmlLink,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Calendar request failed: ${message}`);
      return failure(`Google Calendar request failed: ${message}`);
    }
  }
}
