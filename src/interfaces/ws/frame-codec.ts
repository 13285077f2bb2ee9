import { createHash } from 'node:crypto';

/**
 * RFC 6455 framing helpers.
 *
 * Server → client frames are never masked. Client → server frames are
 * always masked (§5.3) and are unmasked while parsing.
 */

const WS_GUID = '258EAFA5-E914-47DA-95CA-5AB9FC11CF97';

export const Opcode = {
  CONTINUATION: 0x00,
  TEXT: 0x01,
  BINARY: 0x02,
  CLOSE: 0x08,
  PING: 0x09,
  PONG: 0x0a,
} as const;

/** Inbound frames larger than this are rejected as malformed. */
export const MAX_INBOUND_PAYLOAD = 64 * 1024;

export interface ParsedFrame {
  fin: boolean;
  opcode: number;
  payload: Buffer;
  nextOffset: number;
}

/** Value for the `Sec-WebSocket-Accept` handshake header. */
export function computeAcceptKey(secWebSocketKey: string): string {
  return createHash('sha1')
    .update(secWebSocketKey + WS_GUID)
    .digest('base64');
}

/**
 * Thrown for a frame whose declared payload exceeds {@link MAX_INBOUND_PAYLOAD}.
 * `frameLength` is the full on-wire size, so the caller can skip it.
 */
export class FrameTooLargeError extends Error {
  readonly frameLength: number;

  constructor(payloadLength: number, frameLength: number) {
    super(`WebSocket frame of ${payloadLength} bytes exceeds ${MAX_INBOUND_PAYLOAD}`);
    this.name = 'FrameTooLargeError';
    this.frameLength = frameLength;
  }
}

/**
 * Parse ONE frame from the front of `buf`.
 * Returns null when more bytes are needed.
 * Throws {@link FrameTooLargeError} for oversized frames and a plain Error
 * for lengths that cannot be represented.
 */
export function parseFrame(buf: Buffer): ParsedFrame | null {
  if (buf.length < 2) return null;

  const b0 = buf[0]!;
  const b1 = buf[1]!;

  const fin = (b0 & 0x80) === 0x80;
  const opcode = b0 & 0x0f;
  const masked = (b1 & 0x80) === 0x80;

  let payloadLen = b1 & 0x7f;
  let offset = 2;

  if (payloadLen === 126) {
    if (buf.length < offset + 2) return null;
    payloadLen = buf.readUInt16BE(offset);
    offset += 2;
  } else if (payloadLen === 127) {
    if (buf.length < offset + 8) return null;
    const big = buf.readBigUInt64BE(offset);
    if (big > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new Error(`WebSocket frame length ${big} is not representable`);
    }
    payloadLen = Number(big);
    offset += 8;
  }

  const maskLen = masked ? 4 : 0;
  if (payloadLen > MAX_INBOUND_PAYLOAD) {
    throw new FrameTooLargeError(payloadLen, offset + maskLen + payloadLen);
  }

  if (buf.length < offset + maskLen + payloadLen) return null;

  let maskingKey: Buffer | null = null;
  if (masked) {
    maskingKey = buf.subarray(offset, offset + 4);
    offset += 4;
  }

  let payload = buf.subarray(offset, offset + payloadLen);

  if (maskingKey) {
    const unmasked = Buffer.allocUnsafe(payload.length);
    for (let i = 0; i < payload.length; i++) {
      unmasked[i] = payload[i]! ^ maskingKey[i % 4]!;
    }
    payload = unmasked;
  }

  return { fin, opcode, payload, nextOffset: offset + payloadLen };
}

export function encodeControlFrame(opcode: number, payload: Buffer = Buffer.alloc(0)): Buffer {
  // §5.5: control frames carry at most 125 bytes
  const body = payload.length > 125 ? Buffer.alloc(0) : payload;
  const header = Buffer.alloc(2);
  header[0] = 0x80 | opcode; // FIN + opcode
  header[1] = body.length;
  return Buffer.concat([header, body]);
}

export function encodeTextFrame(data: string): Buffer {
  const payload = Buffer.from(data, 'utf-8');
  const len = payload.length;

  let header: Buffer;
  if (len < 126) {
    header = Buffer.alloc(2);
    header[1] = len;
  } else if (len <= 0xffff) {
    header = Buffer.alloc(4);
    header[1] = 126;
    header.writeUInt16BE(len, 2);
  } else {
    header = Buffer.alloc(10);
    header[1] = 127;
    header.writeBigUInt64BE(BigInt(len), 2);
  }
  header[0] = 0x80 | Opcode.TEXT;

  return Buffer.concat([header, payload]);
}
