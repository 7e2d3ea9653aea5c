import { z } from "zod";

export const SessionSchema = z.object({
  id: z.string(),
  agentId: z.string(),
  createdAt: z.string(),
  lastActiveAt: z.string(),
});

export type Session = z.infer<typeof SessionSchema>;

/**
 * Session row plus a short preview of its opening message, as listed by the
 * REST API.
 */
export const SessionSummarySchema = SessionSchema.extend({
  preview: z.string(),
});

export type SessionSummary = z.infer<typeof SessionSummarySchema>;
