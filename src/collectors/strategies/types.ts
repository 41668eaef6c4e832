import type { StatusFetcher } from '../../services/rbd-cli';
import type { ImageStatus, ResourceEntry, StatusShape } from '../../types/rbd/mirror-status';

export type StrategyContext = {
  pool: string;
  signal: AbortSignal;
  fetcher: StatusFetcher;
  /** `--cluster <name>` when the scrape is cluster-scoped, otherwise empty. */
  clusterArgs: readonly string[];
};

/**
 * One way of reading `rbd mirror pool status` output into per-image status.
 */
export interface StatusShapeStrategy {
  readonly shape: Exclude<StatusShape, 'auto'>;
  listResources(payload: unknown): ResourceEntry[];
  resolveStatus(entry: ResourceEntry, ctx: StrategyContext): Promise<ImageStatus>;
}
