import { z } from 'zod';
import type { PongFrame } from '../../domain/index.js';

/**
 * Inbound subscriber message. Only `type` is inspected; extra members are
 * allowed so clients can attach their own data to a ping.
 */
export const clientMessageSchema = z.object({
  type: z.string(),
}).passthrough();

export type ClientMessage = z.infer<typeof clientMessageSchema>;

/** Parses a text frame; null when it is not JSON or not a message object. */
export function parseClientMessage(text: string): ClientMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  const result = clientMessageSchema.safeParse(json);
  return result.success ? result.data : null;
}

/**
 * Returns the reply to send for an inbound text frame, or null when the
 * frame needs no reply. Malformed input never raises.
 */
export function handleClientMessage(text: string): string | null {
  const message = parseClientMessage(text);
  if (message?.type === 'ping') {
    const pong: PongFrame = { type: 'pong' };
    return JSON.stringify(pong);
  }
  return null;
}
