import { RbdExecError, describeError } from '../lib/errors';
import defaultLogger from '../lib/logger';
import type { Logger } from '../lib/logger';
import { buildImageSamples } from '../metrics/samples';
import type { MetricSample, MetricSink } from '../metrics/samples';
import type { MetricSchema } from '../metrics/schema';
import type { StatusFetcher } from '../services/rbd-cli';
import type { ImageStatus, ResourceEntry, StatusShape } from '../types/rbd/mirror-status';
import { parseJsonText } from './strategies/decode';
import { selectStrategy } from './strategies';
import type { StrategyContext } from './strategies';

export const DEFAULT_SCRAPE_TIMEOUT_MS = 15_000;

// rbd's own name for a cluster when --cluster is not given.
export const DEFAULT_CLUSTER_NAME = 'ceph';

export type MirrorCollectorOptions = {
  pool: string;
  fetcher: StatusFetcher;
  schema: MetricSchema;
  shape?: StatusShape;
  timeoutMs?: number;
  /** Cluster used when a scrape does not name one. */
  defaultCluster?: string;
  debug?: boolean;
  logger?: Logger;
};

export type ScrapeScope = {
  cluster?: string;
};

export type ScrapeResult = {
  outcome: 'done' | 'aborted';
  resources: number;
  emitted: number;
  skipped: number;
  ignored: number;
  error?: Error;
};

export function poolStatusArgs(pool: string): string[] {
  return ['mirror', 'pool', 'status', pool, '--verbose', '--format', 'json'];
}

/**
 * Turns `rbd mirror ... status` output for one pool into gauge samples, once per scrape.
 *
 * Holds only its configuration and the shared schema, so a single instance serves
 * concurrent scrapes.
 */
export class MirrorCollector {
  private readonly pool: string;
  private readonly fetcher: StatusFetcher;
  private readonly schema: MetricSchema;
  private readonly shape: StatusShape;
  private readonly timeoutMs: number;
  private readonly defaultCluster?: string;
  private readonly debug: boolean;
  private readonly logger: Logger;

  constructor(options: MirrorCollectorOptions) {
    this.pool = options.pool;
    this.fetcher = options.fetcher;
    this.schema = options.schema;
    this.shape = options.shape ?? 'auto';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SCRAPE_TIMEOUT_MS;
    this.defaultCluster = options.defaultCluster;
    this.debug = options.debug ?? false;
    this.logger = (options.logger ?? defaultLogger).child('collector');
  }

  /**
   * Runs one scrape, streaming samples into `sink`. Never rejects: failures show up as
   * missing series, log lines, and the returned outcome.
   */
  async collect(sink: MetricSink, scope: ScrapeScope = {}): Promise<ScrapeResult> {
    const result: ScrapeResult = { outcome: 'done', resources: 0, emitted: 0, skipped: 0, ignored: 0 };
    const cluster = scope.cluster ?? this.defaultCluster;
    const clusterArgs = cluster ? ['--cluster', cluster] : [];
    const log = cluster ? this.logger.child(cluster) : this.logger;
    const signal = AbortSignal.timeout(this.timeoutMs);

    const abort = (message: string, err: unknown): ScrapeResult => {
      log.error(message, { pool: this.pool, err });
      result.outcome = 'aborted';
      result.error = err instanceof Error ? err : new Error(describeError(err));
      return result;
    };

    let payload: unknown;
    try {
      const raw = await this.fetcher.fetch(signal, [...clusterArgs, ...poolStatusArgs(this.pool)]);
      payload = parseJsonText(raw.toString('utf8'), 'pool status');
    } catch (err) {
      return abort('mirror pool status failed', err);
    }

    const strategy = selectStrategy(this.shape, payload);
    let entries: ResourceEntry[];
    try {
      entries = strategy.listResources(payload);
    } catch (err) {
      return abort('mirror pool status has unexpected shape', err);
    }
    result.resources = entries.length;
    if (this.debug) {
      log.debug('pool status fetched', { pool: this.pool, shape: strategy.shape, images: entries.length });
    }

    const ctx: StrategyContext = { pool: this.pool, signal, fetcher: this.fetcher, clusterArgs };
    const labelCluster = cluster ?? DEFAULT_CLUSTER_NAME;

    for (const entry of entries) {
      if (signal.aborted) {
        return abort('scrape deadline elapsed', signal.reason);
      }

      let status: ImageStatus;
      try {
        status = await strategy.resolveStatus(entry, ctx);
      } catch (err) {
        if (err instanceof RbdExecError && err.reason === 'timeout') {
          return abort('scrape deadline elapsed', err);
        }
        log.warn(`skipping image ${entry.name}`, { pool: this.pool, image: entry.name, err });
        result.skipped += 1;
        continue;
      }

      if (status.kind === 'unknown') {
        if (this.debug) {
          log.debug(`ignoring image ${entry.name}`, { mode: status.mode ?? null });
        }
        result.ignored += 1;
        continue;
      }

      let samples: MetricSample[];
      try {
        samples = buildImageSamples(this.schema, status, {
          cluster: labelCluster,
          pool: this.pool,
          image: entry.name,
        });
      } catch (err) {
        log.warn(`skipping image ${entry.name}`, { pool: this.pool, image: entry.name, err });
        result.skipped += 1;
        continue;
      }

      for (const sample of samples) {
        sink.emit(sample);
        result.emitted += 1;
      }
    }

    return result;
  }
}
