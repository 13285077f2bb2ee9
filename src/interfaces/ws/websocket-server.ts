import type { Server as HttpServer, IncomingMessage } from 'node:http';
import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { randomUUID } from 'node:crypto';
import type { BaseLogger } from 'pino';
import type { ConnectionFrame } from '../../domain/index.js';
import type { SubscriberRegistry } from '../../application/subscriber-registry.js';
import { handleClientMessage } from './client-messages.js';
import {
  FrameTooLargeError,
  Opcode,
  computeAcceptKey,
  encodeControlFrame,
  encodeTextFrame,
  parseFrame,
} from './frame-codec.js';

/**
 * WebSocket transport for relay subscribers, on raw Node.js HTTP upgrade.
 *
 * Per connection:
 * - registers a subscriber under a fresh UUID and sends the greeting frame
 * - answers JSON `{"type":"ping"}` text frames with `{"type":"pong"}`
 * - ignores any other text frame, and drops oversized frames unread,
 *   without closing the connection
 * - protocol PING → PONG, CLOSE → echo close + teardown
 * - server heartbeat PING; a client that missed the previous one is dropped
 * - removes the subscriber on close/error
 *
 * The transport never reads the stream or triggers broadcasts; the relay
 * pipeline reaches clients only through the registry.
 */

export const DEFAULT_GREETING = 'Connected to VLM stream';

export interface WebSocketServerOptions {
  path: string;
  greeting: string;
  heartbeatIntervalMs: number;
}

const DEFAULT_OPTIONS: WebSocketServerOptions = {
  path: '/ws',
  greeting: DEFAULT_GREETING,
  heartbeatIntervalMs: 30_000,
};

interface WsClient {
  id: string;
  socket: Socket;
  alive: boolean;
  closed: boolean;
  buffer: Buffer;
  /** Bytes still to drop from an oversized frame. */
  discard: number;
}

export class WebSocketServer {
  private clients = new Map<string, WsClient>();
  private readonly registry: SubscriberRegistry;
  private readonly log: BaseLogger;
  private readonly options: WebSocketServerOptions;
  private pingInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    registry: SubscriberRegistry,
    log: BaseLogger,
    options: Partial<WebSocketServerOptions> = {},
  ) {
    this.registry = registry;
    this.log = log;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /* ------------------------------------------------------------------ */
  /*  Attach to HTTP server                                             */
  /* ------------------------------------------------------------------ */

  attach(server: HttpServer): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });

    // Heartbeat: PING every interval, drop unresponsive clients
    this.pingInterval = setInterval(() => {
      for (const client of this.clients.values()) {
        if (!client.alive) {
          this.log.debug({ clientId: client.id }, 'Heartbeat timeout — removing client');
          this.gracefulClose(client, 'heartbeat_timeout');
          continue;
        }
        client.alive = false;
        this.safeWrite(client, encodeControlFrame(Opcode.PING));
      }
    }, this.options.heartbeatIntervalMs);

    this.log.info({ path: this.options.path }, 'WebSocket server attached');
  }

  /* ------------------------------------------------------------------ */
  /*  Public helpers                                                     */
  /* ------------------------------------------------------------------ */

  get clientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    for (const client of this.clients.values()) {
      this.gracefulClose(client, 'server_shutdown');
    }
    this.clients.clear();
  }

  /* ------------------------------------------------------------------ */
  /*  Private — handshake                                               */
  /* ------------------------------------------------------------------ */

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    // Node hands upgrades over as a Duplex; for HTTP servers it is a net.Socket
    if (!(socket instanceof Socket)) {
      socket.destroy();
      return;
    }

    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (pathname !== this.options.path) {
      socket.destroy();
      return;
    }

    const key = req.headers['sec-websocket-key'];
    if (!key) {
      socket.destroy();
      return;
    }

    socket.write(
      'HTTP/1.1 101 Switching Protocols\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        `Sec-WebSocket-Accept: ${computeAcceptKey(key)}\r\n` +
        '\r\n',
    );

    // After the upgrade the HTTP parser pushes EOF into the readable side.
    // With allowHalfOpen=false that would end the socket straight away.
    socket.allowHalfOpen = true;
    socket.setTimeout(0);
    socket.setNoDelay(true);
    socket.setKeepAlive(true, 30_000);

    const client: WsClient = {
      id: randomUUID(),
      socket,
      alive: true,
      closed: false,
      buffer: head.length > 0 ? Buffer.from(head) : Buffer.alloc(0),
      discard: 0,
    };

    this.clients.set(client.id, client);
    this.registry.add({
      id: client.id,
      connectedAt: new Date(),
      messagesSent: 0,
      connection: {
        send: (text) => this.sendText(client, text),
        close: (reason) => this.gracefulClose(client, reason),
      },
    });

    this.log.info(
      { clientId: client.id, clientCount: this.registry.count() },
      'Client connected',
    );

    socket.on('data', (chunk: Buffer) => this.handleData(client, chunk));

    socket.on('end', () => {
      // Spurious readable EOF right after the upgrade; real disconnects
      // arrive as 'close', a CLOSE frame or a missed heartbeat.
      this.log.debug({ clientId: client.id }, 'Socket end event (readable EOF — ignored)');
    });

    socket.on('close', (hadError: boolean) => {
      this.gracefulClose(client, hadError ? 'close_error' : 'close');
    });

    socket.on('error', (err) => {
      if (!client.closed) {
        this.log.debug({ clientId: client.id, err }, 'Socket error event');
      }
      this.gracefulClose(client, 'error');
    });

    const greeting: ConnectionFrame = {
      type: 'connection',
      message: this.options.greeting,
      client_id: client.id,
    };
    this.sendText(client, JSON.stringify(greeting)).catch((err: unknown) => {
      this.log.warn({ err, clientId: client.id }, 'Failed to send greeting');
      this.gracefulClose(client, 'greeting_failed');
    });

    socket.resume();
  }

  /* ------------------------------------------------------------------ */
  /*  Private — inbound frames                                          */
  /* ------------------------------------------------------------------ */

  private handleData(client: WsClient, chunk: Buffer): void {
    if (client.closed) return;

    client.buffer = Buffer.concat([client.buffer, chunk]);

    // consume as many complete frames as possible
    while (client.buffer.length > 0) {
      if (client.discard > 0) {
        const dropped = Math.min(client.discard, client.buffer.length);
        client.buffer = client.buffer.subarray(dropped);
        client.discard -= dropped;
        continue;
      }

      let frame: ReturnType<typeof parseFrame>;
      try {
        frame = parseFrame(client.buffer);
      } catch (err: unknown) {
        if (err instanceof FrameTooLargeError) {
          this.log.debug({ clientId: client.id, err }, 'Oversized frame discarded');
          client.discard = err.frameLength;
          continue;
        }
        this.log.warn({ clientId: client.id, err }, 'WebSocket frame parse error — closing client');
        this.gracefulClose(client, 'frame_parse_error');
        return;
      }

      if (!frame) break; // need more bytes

      client.buffer = client.buffer.subarray(frame.nextOffset);
      client.alive = true; // any valid frame resets heartbeat

      switch (frame.opcode) {
        case Opcode.PONG:
          continue;

        case Opcode.PING:
          this.safeWrite(client, encodeControlFrame(Opcode.PONG, frame.payload));
          continue;

        case Opcode.CLOSE:
          this.safeWrite(client, encodeControlFrame(Opcode.CLOSE, frame.payload));
          this.gracefulClose(client, 'close_frame');
          return;

        case Opcode.TEXT:
          if (frame.fin) {
            this.handleText(client, frame.payload.toString('utf-8'));
          } else {
            this.log.debug({ clientId: client.id }, 'Fragmented text frame ignored');
          }
          continue;

        default:
          // BINARY / CONTINUATION: not part of the protocol, ignored
          continue;
      }
    }
  }

  private handleText(client: WsClient, text: string): void {
    const reply = handleClientMessage(text);
    if (reply === null) {
      this.log.debug({ clientId: client.id }, 'Ignoring unrecognized client message');
      return;
    }
    this.safeWrite(client, encodeTextFrame(reply));
  }

  /* ------------------------------------------------------------------ */
  /*  Private — outbound + lifecycle                                    */
  /* ------------------------------------------------------------------ */

  /** Resolves once the frame is flushed to the socket; rejects on a dead client. */
  private sendText(client: WsClient, text: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (client.closed || client.socket.destroyed) {
        reject(new Error(`Client ${client.id} is closed`));
        return;
      }
      try {
        client.socket.write(encodeTextFrame(text), (err) => {
          if (err) reject(err);
          else resolve();
        });
      } catch (err: unknown) {
        reject(err);
      }
    });
  }

  /** Fire-and-forget write for control frames and replies. */
  private safeWrite(client: WsClient, data: Buffer): boolean {
    if (client.closed || client.socket.destroyed) return false;
    try {
      client.socket.write(data);
      return true;
    } catch (err: unknown) {
      this.log.debug({ clientId: client.id, err }, 'Socket write threw');
      this.gracefulClose(client, 'write_error');
      return false;
    }
  }

  /**
   * Idempotent teardown: drops the client from the transport and the
   * registry and destroys the socket. `reason` is logged.
   */
  private gracefulClose(client: WsClient, reason: string): void {
    if (client.closed) return;
    client.closed = true;
    this.clients.delete(client.id);
    this.registry.remove(client.id);

    if (!client.socket.destroyed) {
      client.socket.destroy();
    }

    this.log.info(
      { clientId: client.id, reason, clientCount: this.registry.count() },
      'Client disconnected',
    );
  }
}
