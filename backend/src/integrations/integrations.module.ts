import { Module } from '@nestjs/common';
import { GmailService } from './google/gmail.service.js';
import { GoogleCalendarService } from './google/google-calendar.service.js';
import { GoogleCredentialsService } from './google/google-credentials.service.js';
import { AppleNotesService } from './notes/apple-notes.service.js';

@Module({
  providers: [
    GoogleCredentialsService,
    GoogleCalendarService,
    GmailService,
    AppleNotesService,
  ],
  exports: [GoogleCalendarService, GmailService, AppleNotesService],
})
export class IntegrationsModule {}
