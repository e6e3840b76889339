import { z } from 'zod';

export const ChatInput = z.object({
  message: z.string().min(1).max(2000),
  sessionId: z.string().min(1).max(64).optional(),
});
export type ChatInputT = z.infer<typeof ChatInput>;

export const ChatOutput = z.object({
  reply: z.string().min(1),
  sessionId: z.string().min(1).max(64),
});
export type ChatOutputT = z.infer<typeof ChatOutput>;
