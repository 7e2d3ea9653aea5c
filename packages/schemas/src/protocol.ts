import { z } from "zod";
import { MessageSchema } from "./message.js";
import { SessionSchema } from "./session.js";

// ── Browser → server ─────────────────────────────────────────────────

export const ClientMessageFrameSchema = z.object({
  type: z.literal("message"),
  sessionId: z.string().min(1).optional(),
  agentId: z.string().min(1),
  text: z.string().min(1),
  threadId: z.string().optional(),
});

export const ClientPingFrameSchema = z.object({
  type: z.literal("ping"),
});

export const ClientFrameSchema = z.discriminatedUnion("type", [
  ClientMessageFrameSchema,
  ClientPingFrameSchema,
]);

export type ClientMessageFrame = z.infer<typeof ClientMessageFrameSchema>;
export type ClientFrame = z.infer<typeof ClientFrameSchema>;

// ── Server → browser ─────────────────────────────────────────────────

export const ServerFrameSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("history"), messages: z.array(MessageSchema) }),
  z.object({ type: z.literal("session"), session: SessionSchema }),
  z.object({ type: z.literal("fragment"), text: z.string() }),
  z.object({ type: z.literal("thread"), threadId: z.string() }),
  z.object({ type: z.literal("done"), messageId: z.string() }),
  z.object({ type: z.literal("error"), reason: z.string() }),
  z.object({ type: z.literal("busy") }),
  z.object({ type: z.literal("pong") }),
]);

export type ServerFrame = z.infer<typeof ServerFrameSchema>;
