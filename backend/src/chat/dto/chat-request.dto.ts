import { z } from 'zod';

const historyContentSchema = z.string().max(20_000);

export const chatHistoryMessageSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('user'), content: historyContentSchema }),
  z.object({ role: z.literal('assistant'), content: historyContentSchema }),
]);

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message is required').max(8_000),
  history: z.array(chatHistoryMessageSchema).max(50).default([]),
  image: z.string().trim().min(1).optional(),
});

export type ChatHistoryMessageDto = z.infer<typeof chatHistoryMessageSchema>;
export type ChatRequestDto = z.infer<typeof chatRequestSchema>;
