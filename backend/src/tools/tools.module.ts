import { Module } from '@nestjs/common';
import { DocumentsModule, RetrievalService } from '../documents/index.js';
import {
  AppleNotesService,
  GmailService,
  GoogleCalendarService,
  IntegrationsModule,
} from '../integrations/index.js';
import {
  TOOL_DESCRIPTORS,
  addCalendarEventSchema,
  composeGmailSchema,
  createAppleNoteSchema,
  searchDocumentsToolSchema,
} from './tool-descriptors.js';
import { ToolRegistry, parseToolInput } from './tool-registry.js';

@Module({
  imports: [DocumentsModule, IntegrationsModule],
  providers: [
    {
      provide: ToolRegistry,
      useFactory: (
        calendar: GoogleCalendarService,
        notes: AppleNotesService,
        gmail: GmailService,
        retrieval: RetrievalService,
      ): ToolRegistry => {
        const registry = new ToolRegistry(TOOL_DESCRIPTORS);
        registry.register('add_calendar_event', (args) =>
          calendar.addEvent(parseToolInput(addCalendarEventSchema, args)),
        );
        registry.register('create_apple_note', (args) =>
          notes.createNote(parseToolInput(createAppleNoteSchema, args)),
        );
        registry.register('compose_gmail', (args) =>
          gmail.sendMessage(parseToolInput(composeGmailSchema, args)),
        );
        registry.register('search_documents', (args) => {
          const { query, top_k } = parseToolInput(searchDocumentsToolSchema, args);
          return retrieval.searchAsToolResult(query, top_k);
        });
        return registry;
      },
      inject: [GoogleCalendarService, AppleNotesService, GmailService, RetrievalService],
    },
  ],
  exports: [ToolRegistry],
})
export class ToolsModule {}
