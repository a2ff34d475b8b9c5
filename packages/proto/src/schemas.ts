import { z } from 'zod';

/** Body of POST /api/chat, the JSON chat transport */
export const chatRequestSchema = z.object({
  userId: z.string().trim().min(1).max(256),
  text: z.string().max(4000),
});
export type ChatRequest = z.infer<typeof chatRequestSchema>;

export interface ChatReply {
  reply: string;
  /** Messages produced since the last reply, e.g. authorization completed */
  notifications?: string[];
}

/** Query string of the OAuth redirect callback */
export const callbackQuerySchema = z.object({
  state: z.string().optional(),
  code: z.string().optional(),
  error: z.string().optional(),
});
