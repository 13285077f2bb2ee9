import type { BaseLogger } from 'pino';
import type { Subscriber, SubscriberRegistry } from './subscriber-registry.js';

export interface BroadcasterOptions {
  /** Upper bound for a single subscriber write (ms). */
  sendTimeoutMs: number;
}

export interface BroadcastResult {
  attempted: number;
  delivered: number;
  failed: number;
}

export const DEFAULT_SEND_TIMEOUT_MS = 5000;

/**
 * Fans one encoded payload out to every registered subscriber.
 *
 * Each subscriber is written independently. A rejected or timed-out write
 * counts as a disconnect: the subscriber is dropped from the registry, its
 * connection is closed and the pass carries on with the rest;
 * `broadcast` itself never rejects. Delivery is at-most-once: nothing is
 * buffered for subscribers that connect later.
 */
export class Broadcaster {
  private readonly registry: SubscriberRegistry;
  private readonly log: BaseLogger;
  private readonly sendTimeoutMs: number;

  constructor(
    registry: SubscriberRegistry,
    log: BaseLogger,
    options: Partial<BroadcasterOptions> = {},
  ) {
    this.registry = registry;
    this.log = log;
    this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
  }

  async broadcast(payload: string): Promise<BroadcastResult> {
    const subscribers = this.registry.snapshot();
    if (subscribers.length === 0) {
      return { attempted: 0, delivered: 0, failed: 0 };
    }

    const outcomes = await Promise.allSettled(
      subscribers.map((subscriber) => this.deliver(subscriber, payload)),
    );

    let delivered = 0;
    let failed = 0;

    outcomes.forEach((outcome, i) => {
      const subscriber = subscribers[i];
      if (!subscriber) return;

      if (outcome.status === 'fulfilled') {
        this.registry.recordDelivery(subscriber.id);
        delivered++;
        return;
      }

      failed++;
      this.registry.remove(subscriber.id);
      subscriber.connection.close('send_failed');
      this.log.warn(
        { err: outcome.reason, clientId: subscriber.id, clientCount: this.registry.count() },
        'Failed to send to client, disconnecting',
      );
    });

    this.log.debug(
      { attempted: subscribers.length, delivered, failed },
      'Broadcasted to clients',
    );

    return { attempted: subscribers.length, delivered, failed };
  }

  private deliver(subscriber: Subscriber, payload: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Send timed out after ${this.sendTimeoutMs}ms`));
      }, this.sendTimeoutMs);

      // Wrap so a synchronous throw from send() becomes a rejection
      Promise.resolve()
        .then(() => subscriber.connection.send(payload))
        .then(
          () => {
            clearTimeout(timer);
            resolve();
          },
          (err: unknown) => {
            clearTimeout(timer);
            reject(err);
          },
        );
    });
  }
}
