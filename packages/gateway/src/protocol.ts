import { ClientFrameSchema, type ClientFrame, type ServerFrame } from '@agent-studio/schemas';

export const INVALID_FRAME_REASON = 'Invalid frame';

/** Close code sent when a connection names a session that does not exist. */
export const SESSION_NOT_FOUND_CLOSE_CODE = 4004;

export function parseFrame(raw: string): ClientFrame | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = ClientFrameSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export function encodeFrame(frame: ServerFrame): string {
  return JSON.stringify(frame);
}
