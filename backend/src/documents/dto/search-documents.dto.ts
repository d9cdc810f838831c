import { z } from 'zod';

export const searchDocumentsSchema = z.object({
  q: z.string().trim().min(1, 'q is required'),
  topK: z.coerce.number().int().positive().max(50).optional(),
});

export type SearchDocumentsDto = z.infer<typeof searchDocumentsSchema>;

export const documentIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,80}$/, 'documentId must be a sanitized document id');
