import { vi } from 'vitest';
import type { StreamEntry } from '../src/domain/index.js';
import type { Subscriber, SubscriberConnection } from '../src/application/subscriber-registry.js';
import type { UpstreamLog } from '../src/infrastructure/worker/upstream-log.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    level: 'info',
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  } as unknown as import('pino').BaseLogger;
}

/** Subscriber connection that records what it was sent. */
export class FakeConnection implements SubscriberConnection {
  readonly sent: string[] = [];
  readonly closeReasons: string[] = [];
  send = vi.fn(async (text: string): Promise<void> => {
    this.sent.push(text);
  });
  close = vi.fn((reason: string): void => {
    this.closeReasons.push(reason);
  });
}

export function makeSubscriber(
  id: string,
  connection: SubscriberConnection = new FakeConnection(),
): Subscriber {
  return {
    id,
    connectedAt: new Date('2026-01-01T00:00:00Z'),
    messagesSent: 0,
    connection,
  };
}

export function entry(id: string, fields: Record<string, string> = {}): StreamEntry {
  return { id, fields };
}

type ReadOutcome = StreamEntry[] | Error;

/**
 * In-process stand-in for the Redis-backed log.
 *
 * Queued read outcomes are returned in order; once the queue is empty each
 * read waits 1 ms and returns nothing, after calling `onIdle`.
 */
export class FakeUpstreamLog implements UpstreamLog {
  connected = false;
  connectResults: boolean[] = [];
  reads: ReadOutcome[] = [];
  readCalls: Array<{ position: string; maxWaitMs: number; maxCount: number }> = [];
  connectCalls = 0;
  disconnectCalls = 0;
  onIdle: (() => void) | null = null;

  async connect(): Promise<boolean> {
    this.connectCalls++;
    const ok = this.connectResults.shift() ?? true;
    this.connected = ok;
    return ok;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async readAfter(position: string, maxWaitMs: number, maxCount: number): Promise<StreamEntry[]> {
    this.readCalls.push({ position, maxWaitMs, maxCount });
    const next = this.reads.shift();
    if (next === undefined) {
      this.onIdle?.();
      await new Promise((resolve) => setTimeout(resolve, 1));
      return [];
    }
    if (next instanceof Error) throw next;
    return next;
  }
}
