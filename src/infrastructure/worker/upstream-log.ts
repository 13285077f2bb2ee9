import type { StreamEntry } from '../../domain/index.js';

/**
 * Ordered append-only log the relay tails.
 *
 * `readAfter` blocks up to `maxWaitMs` and returns at most `maxCount`
 * entries with ids strictly after `position` (`$` = only entries appended
 * after the call). It rejects with `UpstreamUnavailableError` when the
 * connection is gone; any other rejection is treated as transient.
 */
export interface UpstreamLog {
  connect(): Promise<boolean>;
  disconnect(): Promise<void>;
  readAfter(position: string, maxWaitMs: number, maxCount: number): Promise<StreamEntry[]>;
  isConnected(): boolean;
}

/** Upstream connection is down; the caller should reconnect. */
export class UpstreamUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamUnavailableError';
  }
}

/** Position meaning "only entries appended from now on". */
export const LATEST_POSITION = '$';
