import { z } from 'zod';

export const ChatRequestSchema = z.object({
  session_id: z.string().min(1).max(128).optional(),
  request_id: z.string().min(1).max(128).optional(),
  message: z.string().min(1),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;
