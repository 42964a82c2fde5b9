import { z } from 'zod';

export const ChatInput = z.object({
  message: z.string().trim().min(1).max(2000),
  session_id: z.string().min(1).max(64).optional(),
});
export type ChatInputT = z.infer<typeof ChatInput>;

export const SourceRecord = z.object({
  type: z.enum(['document', 'knowledge', 'web']),
  query: z.string().optional(),
  content: z.string().optional(),
  relevance: z.number().optional(),
  url: z.string().optional(),
});

export const ChatOutput = z.object({
  message: z.string(),
  sources: z.array(SourceRecord).optional(),
  tool_calls: z.array(z.string()).optional(),
  session_id: z.string().min(1),
});
export type ChatOutputT = z.infer<typeof ChatOutput>;
