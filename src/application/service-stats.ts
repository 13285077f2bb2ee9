import type { SubscriberRegistry } from './subscriber-registry.js';

export const SERVICE_NAME = 'VLM WebSocket Service';

export interface ServiceStats {
  connected_clients: number;
  total_messages_processed: number;
  uptime_seconds: number;
  redis_connected: boolean;
}

export interface HealthReport {
  status: 'healthy';
  service: string;
  redis_status: 'connected' | 'disconnected';
  connected_clients: number;
  total_messages_processed: number;
  uptime_seconds: number;
  timestamp: number;
}

/**
 * Read-side view over the relay's state.
 *
 * Holds only the start time and the processed counter; everything else is
 * read from the registry and the upstream liveness check at call time.
 */
export class ServiceStatsAggregator {
  private readonly registry: SubscriberRegistry;
  private readonly upstreamConnected: () => boolean;
  private readonly now: () => number;
  private readonly startedAt: number;
  private processed = 0;

  constructor(
    registry: SubscriberRegistry,
    upstreamConnected: () => boolean,
    now: () => number = Date.now,
  ) {
    this.registry = registry;
    this.upstreamConnected = upstreamConnected;
    this.now = now;
    this.startedAt = now();
  }

  /** Called once per relayed entry, whether or not anyone received it. */
  recordProcessed(): void {
    this.processed++;
  }

  getStats(): ServiceStats {
    return {
      connected_clients: this.registry.count(),
      total_messages_processed: this.processed,
      uptime_seconds: Math.floor((this.now() - this.startedAt) / 1000),
      redis_connected: this.upstreamConnected(),
    };
  }

  getHealth(): HealthReport {
    const stats = this.getStats();
    return {
      status: 'healthy',
      service: SERVICE_NAME,
      redis_status: stats.redis_connected ? 'connected' : 'disconnected',
      connected_clients: stats.connected_clients,
      total_messages_processed: stats.total_messages_processed,
      uptime_seconds: stats.uptime_seconds,
      timestamp: this.now(),
    };
  }
}
