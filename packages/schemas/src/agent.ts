import { z } from "zod";

/**
 * Agent reference as returned by the external agent service. Only `id` is
 * required; unknown fields are passed through untouched.
 */
export const AgentSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    description: z.string().optional(),
    instructions: z.string().optional(),
  })
  .passthrough();

export type Agent = z.infer<typeof AgentSchema>;

/**
 * The agent listing endpoint answers either with a bare array or with the
 * array wrapped under one of a few keys.
 */
export const AgentListBodySchema = z.union([
  z.array(AgentSchema),
  z.object({ agents: z.array(AgentSchema) }),
  z.object({ data: z.array(AgentSchema) }),
  z.object({ results: z.array(AgentSchema) }),
]);

export const SocketTokenBodySchema = z.object({
  token: z.string().min(1),
});

/**
 * A frame pushed by the agent service over its streaming socket. Known types
 * are `connected`, `typing`, `thread_info`, `chunk` and `complete`; any frame
 * carrying `error` reports a failure.
 */
export const AgentSocketFrameSchema = z
  .object({
    type: z.string().optional(),
    content: z.string().optional(),
    threadId: z.string().optional(),
    isTyping: z.boolean().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

export type AgentSocketFrame = z.infer<typeof AgentSocketFrameSchema>;
