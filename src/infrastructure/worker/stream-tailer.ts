import type { BaseLogger } from 'pino';
import type { StreamEntry } from '../../domain/index.js';
import type { UpstreamLog } from './upstream-log.js';
import { LATEST_POSITION, UpstreamUnavailableError } from './upstream-log.js';

export type TailerState = 'disconnected' | 'idle' | 'reading' | 'stopped';

export interface StreamTailerOptions {
  /** How long one read blocks waiting for new entries (ms). */
  blockMs: number;
  /** Max entries per read. */
  batchSize: number;
  /** Wait before reconnecting after the upstream went away (ms). */
  reconnectDelayMs: number;
  /** Wait before retrying the same position after a transient read error (ms). */
  retryDelayMs: number;
}

export const DEFAULT_TAILER_OPTIONS: StreamTailerOptions = {
  blockMs: 1000,
  batchSize: 10,
  reconnectDelayMs: 5000,
  retryDelayMs: 1000,
};

/**
 * Resumable tail of the upstream log.
 *
 * State machine:
 *   disconnected --connect ok--> idle --read--> reading --batch done--> idle
 *   disconnected --connect fail--> (wait reconnectDelayMs) disconnected
 *   reading --UpstreamUnavailableError--> disconnected
 *   reading --other error--> (wait retryDelayMs) idle, same position
 *   any --signal aborted--> stopped
 *
 * The cursor starts at "$" (no history replay) and moves to an entry's id
 * only once the consumer has finished with it, i.e. when the generator is
 * resumed after the `yield`. A crash therefore loses at most the batch in
 * flight and never reorders entries.
 */
export class StreamTailer {
  private readonly upstream: UpstreamLog;
  private readonly log: BaseLogger;
  private readonly options: StreamTailerOptions;
  private position = LATEST_POSITION;
  private currentState: TailerState = 'disconnected';
  private started = false;

  constructor(upstream: UpstreamLog, log: BaseLogger, options: Partial<StreamTailerOptions> = {}) {
    this.upstream = upstream;
    this.log = log;
    this.options = { ...DEFAULT_TAILER_OPTIONS, ...options };
  }

  get state(): TailerState {
    return this.currentState;
  }

  /** Id of the last fully processed entry, or "$" before the first one. */
  get cursor(): string {
    return this.position;
  }

  isUpstreamConnected(): boolean {
    return this.upstream.isConnected();
  }

  /**
   * Yields entries in log order until `signal` is aborted.
   * Can only be iterated once per tailer.
   */
  async *entries(signal: AbortSignal): AsyncGenerator<StreamEntry, void, undefined> {
    if (this.started) {
      throw new Error('StreamTailer.entries() can only be consumed once');
    }
    this.started = true;

    this.log.info(
      { position: this.position, batchSize: this.options.batchSize, blockMs: this.options.blockMs },
      'Stream tailing started',
    );

    try {
      while (!signal.aborted) {
        if (this.currentState === 'disconnected') {
          await this.reconnect(signal);
          continue;
        }

        const batch = await this.readBatch(signal);
        for (const entry of batch) {
          yield entry;
          // Consumer is done with this entry
          this.position = entry.id;
        }
        if (this.currentState === 'reading') this.currentState = 'idle';
      }
    } finally {
      this.currentState = 'stopped';
      this.log.info({ position: this.position }, 'Stream tailing stopped');
    }
  }

  private async reconnect(signal: AbortSignal): Promise<void> {
    let ok = false;
    try {
      ok = await this.upstream.connect();
    } catch (err: unknown) {
      this.log.warn({ err }, 'Upstream connect threw');
    }
    if (ok) {
      this.currentState = 'idle';
      this.log.info({ position: this.position }, 'Upstream connected, resuming');
      return;
    }
    this.log.warn(
      { retryInMs: this.options.reconnectDelayMs },
      'Upstream unavailable, retrying connection',
    );
    await sleep(this.options.reconnectDelayMs, signal);
  }

  /** Releases the broken connection; a failure here must not stop the tail. */
  private async dropConnection(): Promise<void> {
    try {
      await this.upstream.disconnect();
    } catch (err: unknown) {
      this.log.debug({ err }, 'Upstream disconnect failed');
    }
  }

  private async readBatch(signal: AbortSignal): Promise<StreamEntry[]> {
    this.currentState = 'reading';
    try {
      return await this.upstream.readAfter(
        this.position,
        this.options.blockMs,
        this.options.batchSize,
      );
    } catch (err: unknown) {
      if (signal.aborted) return [];

      if (err instanceof UpstreamUnavailableError) {
        this.currentState = 'disconnected';
        this.log.error(
          { err, retryInMs: this.options.reconnectDelayMs },
          'Upstream connection lost, reconnecting',
        );
        await this.dropConnection();
        await sleep(this.options.reconnectDelayMs, signal);
        return [];
      }

      this.currentState = 'idle';
      this.log.error(
        { err, position: this.position, retryInMs: this.options.retryDelayMs },
        'Stream read failed, retrying',
      );
      await sleep(this.options.retryDelayMs, signal);
      return [];
    }
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
