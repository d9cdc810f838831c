import { z } from 'zod';
import type { AiToolDefinition } from '../ai/index.js';

export const addCalendarEventSchema = z.object({
  title: z.string().min(1).describe('Event title'),
  start_time: z
    .string()
    .min(1)
    .describe('Start time in ISO 8601 format, e.g. 2025-03-14T15:00:00'),
  end_time: z
    .string()
    .min(1)
    .describe('End time in ISO 8601 format, e.g. 2025-03-14T16:00:00'),
  description: z.string().optional().describe('Optional event description'),
});

export const createAppleNoteSchema = z.object({
  title: z.string().min(1).describe('Note title'),
  body: z.string().describe('Note content'),
});

export const composeGmailSchema = z.object({
  to: z.string().email().describe('Recipient email address'),
  subject: z.string().describe('Email subject'),
  body: z.string().describe('Plain-text email body'),
});

export const searchDocumentsToolSchema = z.object({
  query: z.string().min(1).describe('What to look for in the documents'),
  top_k: z
    .number()
    .int()
    .positive()
    .default(5)
    .describe('Number of passages to return'),
});

export const TOOL_DESCRIPTORS: readonly AiToolDefinition[] = Object.freeze([
  Object.freeze({
    name: 'add_calendar_event',
    description:
      "Add an event to the user's Google Calendar. Use for meetings, appointments and reminders with a time.",
    parameters: addCalendarEventSchema,
  }),
  Object.freeze({
    name: 'create_apple_note',
    description: 'Create a note in Apple Notes with a title and body.',
    parameters: createAppleNoteSchema,
  }),
  Object.freeze({
    name: 'compose_gmail',
    description: 'Compose and send an email through Gmail.',
    parameters: composeGmailSchema,
  }),
  Object.freeze({
    name: 'search_documents',
    description:
      "Search the user's uploaded documents (PDF, Word, text, markdown) and return the most relevant passages.",
    parameters: searchDocumentsToolSchema,
  }),
]);
