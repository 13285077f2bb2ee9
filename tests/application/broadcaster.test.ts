import { describe, it, expect, beforeEach } from 'vitest';
import { Broadcaster } from '../../src/application/broadcaster.js';
import { SubscriberRegistry } from '../../src/application/subscriber-registry.js';
import { FakeConnection, fakeLogger, makeSubscriber } from '../helpers.js';

describe('Broadcaster', () => {
  let registry: SubscriberRegistry;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    registry = new SubscriberRegistry();
    log = fakeLogger();
  });

  it('is a no-op with no subscribers', async () => {
    const broadcaster = new Broadcaster(registry, log);

    const result = await broadcaster.broadcast('{"type":"vlm_result"}');

    expect(result).toEqual({ attempted: 0, delivered: 0, failed: 0 });
    expect(log.warn).not.toHaveBeenCalled();
  });

  it('delivers the same payload to every subscriber and counts deliveries', async () => {
    const a = new FakeConnection();
    const b = new FakeConnection();
    const subA = makeSubscriber('a', a);
    const subB = makeSubscriber('b', b);
    registry.add(subA);
    registry.add(subB);
    const broadcaster = new Broadcaster(registry, log);

    const result = await broadcaster.broadcast('payload-1');

    expect(result).toEqual({ attempted: 2, delivered: 2, failed: 0 });
    expect(a.sent).toEqual(['payload-1']);
    expect(b.sent).toEqual(['payload-1']);
    expect(subA.messagesSent).toBe(1);
    expect(subB.messagesSent).toBe(1);
  });

  it('isolates failing subscribers and removes exactly those', async () => {
    const connections = [0, 1, 2, 3, 4].map(() => new FakeConnection());
    connections.forEach((c, i) => registry.add(makeSubscriber(`c${i}`, c)));

    // c1 rejects, c3 throws synchronously
    connections[1]!.send.mockRejectedValueOnce(new Error('socket closed'));
    connections[3]!.send.mockImplementationOnce(() => {
      throw new Error('protocol error');
    });

    const broadcaster = new Broadcaster(registry, log);
    const result = await broadcaster.broadcast('payload');

    for (const c of connections) {
      expect(c.send).toHaveBeenCalledWith('payload');
    }
    expect(result).toEqual({ attempted: 5, delivered: 3, failed: 2 });
    expect(registry.count()).toBe(3);
    expect(registry.snapshot().map((s) => s.id)).toEqual(['c0', 'c2', 'c4']);
    expect(connections[1]!.closeReasons).toEqual(['send_failed']);
    expect(connections[3]!.closeReasons).toEqual(['send_failed']);
    expect(connections[0]!.close).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledTimes(2);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ clientId: 'c1', err: expect.any(Error) }),
      'Failed to send to client, disconnecting',
    );
  });

  it('treats a write that never completes as a failure', async () => {
    const stuck = new FakeConnection();
    stuck.send.mockImplementationOnce(() => new Promise<void>(() => {}));
    const healthy = new FakeConnection();
    registry.add(makeSubscriber('stuck', stuck));
    registry.add(makeSubscriber('healthy', healthy));

    const broadcaster = new Broadcaster(registry, log, { sendTimeoutMs: 20 });
    const result = await broadcaster.broadcast('payload');

    expect(result).toEqual({ attempted: 2, delivered: 1, failed: 1 });
    expect(registry.snapshot().map((s) => s.id)).toEqual(['healthy']);
    expect(healthy.sent).toEqual(['payload']);
  });

  it('does not include a subscriber that joins during the pass', async () => {
    const late = new FakeConnection();
    const early = new FakeConnection();
    early.send.mockImplementationOnce(async () => {
      registry.add(makeSubscriber('late', late));
    });
    registry.add(makeSubscriber('early', early));

    const broadcaster = new Broadcaster(registry, log);
    const result = await broadcaster.broadcast('payload');

    expect(result.attempted).toBe(1);
    expect(late.send).not.toHaveBeenCalled();
    expect(registry.count()).toBe(2);
  });

  it('does not count a delivery for a subscriber removed mid-pass', async () => {
    const conn = new FakeConnection();
    const sub = makeSubscriber('a', conn);
    conn.send.mockImplementationOnce(async () => {
      registry.remove('a');
    });
    registry.add(sub);

    const broadcaster = new Broadcaster(registry, log);
    await broadcaster.broadcast('payload');

    expect(sub.messagesSent).toBe(0);
    expect(registry.count()).toBe(0);
  });

  it('preserves broadcast order per subscriber', async () => {
    const conn = new FakeConnection();
    registry.add(makeSubscriber('a', conn));
    const broadcaster = new Broadcaster(registry, log);

    await broadcaster.broadcast('e1');
    await broadcaster.broadcast('e2');
    await broadcaster.broadcast('e3');

    expect(conn.sent).toEqual(['e1', 'e2', 'e3']);
  });
});
