import { z } from "zod";

export const MessageRoleSchema = z.enum(["user", "assistant"]);

export type MessageRole = z.infer<typeof MessageRoleSchema>;

/**
 * A persisted chat message. `incomplete` marks an assistant reply whose
 * upstream stream failed or was cancelled before it finished.
 */
export const MessageSchema = z.object({
  id: z.string(),
  sessionId: z.string(),
  role: MessageRoleSchema,
  content: z.string(),
  createdAt: z.string(),
  incomplete: z.boolean(),
});

export type Message = z.infer<typeof MessageSchema>;
