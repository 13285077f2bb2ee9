/**
 * Outbound side of one live subscriber connection.
 * `send` resolves once the text has been handed to the socket; `close`
 * tears the connection down and must be safe to call more than once.
 */
export interface SubscriberConnection {
  send(text: string): Promise<void>;
  close(reason: string): void;
}

export interface Subscriber {
  readonly id: string;
  readonly connectedAt: Date;
  messagesSent: number;
  readonly connection: SubscriberConnection;
}

/**
 * In-memory set of connected subscribers, owned by the relay.
 *
 * Node.js runs every mutation synchronously on one thread, so `add` and
 * `remove` can interleave with an in-flight broadcast without locking.
 * Broadcast iterates `snapshot()`, a copy taken when the pass starts, so a
 * subscriber joining or leaving mid-pass never alters that pass.
 */
export class SubscriberRegistry {
  private readonly subscribers = new Map<string, Subscriber>();

  add(subscriber: Subscriber): void {
    this.subscribers.set(subscriber.id, subscriber);
  }

  /** Idempotent. Returns true when a subscriber was actually removed. */
  remove(id: string): boolean {
    return this.subscribers.delete(id);
  }

  get(id: string): Subscriber | undefined {
    return this.subscribers.get(id);
  }

  /** Point-in-time copy, in registration order. */
  snapshot(): Subscriber[] {
    return [...this.subscribers.values()];
  }

  count(): number {
    return this.subscribers.size;
  }

  /** Counts one successful delivery, if the subscriber is still registered. */
  recordDelivery(id: string): void {
    const subscriber = this.subscribers.get(id);
    if (subscriber) subscriber.messagesSent++;
  }
}
