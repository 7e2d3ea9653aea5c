import { z } from "zod";

export const CreateSessionBodySchema = z.object({
  agentId: z.string().min(1),
});

export const MessagesQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(50),
});

/**
 * JSON envelope wrapping every REST response body except health.
 */
export type ApiEnvelope<T> =
  | { success: true; data: T }
  | { success: false; error: string };
