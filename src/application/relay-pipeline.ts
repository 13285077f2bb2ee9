import type { BaseLogger } from 'pino';
import type { StreamEntry } from '../domain/index.js';
import type { Broadcaster } from './broadcaster.js';
import type { ServiceStatsAggregator } from './service-stats.js';
import { inspectRecord, normalizeRecord, toBroadcastFrame } from './normalizer.js';

/** Anything that yields upstream entries in log order. */
export interface EntrySource {
  entries(signal: AbortSignal): AsyncIterable<StreamEntry>;
}

/** Dependencies bundled for the pipeline. */
export interface RelayPipelineDeps {
  source: EntrySource;
  broadcaster: Broadcaster;
  stats: ServiceStatsAggregator;
  log: BaseLogger;
  now?: () => number;
}

/**
 * The single relay task: tail → normalize → encode once → broadcast → count.
 *
 * Entries are handled strictly one after another, so subscribers see them
 * in log order. A failure on one entry is logged and the next one proceeds.
 */
export class RelayPipeline {
  private readonly deps: RelayPipelineDeps;
  private readonly now: () => number;

  constructor(deps: RelayPipelineDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  /** Runs until `signal` is aborted. */
  async run(signal: AbortSignal): Promise<void> {
    this.deps.log.info('Relay pipeline started');

    for await (const entry of this.deps.source.entries(signal)) {
      await this.processEntry(entry);
      if (signal.aborted) break;
    }

    this.deps.log.info('Relay pipeline stopped');
  }

  async processEntry(entry: StreamEntry): Promise<void> {
    const { log } = this.deps;

    try {
      const issues = inspectRecord(entry.fields);
      if (issues.length > 0) {
        log.warn(
          { streamId: entry.id, issues, fields: entry.fields },
          'Malformed stream record, using defaults',
        );
      }

      const result = normalizeRecord(entry.fields, entry.id, this.now);
      const payload = JSON.stringify(toBroadcastFrame(result));

      await this.deps.broadcaster.broadcast(payload);
      this.deps.stats.recordProcessed();

      log.debug(
        { streamId: entry.id, frame: result.frame_number, source: result.source_id },
        'Processed VLM result',
      );
    } catch (err: unknown) {
      log.error({ err, streamId: entry.id, fields: entry.fields }, 'Failed to process stream entry');
    }
  }
}
