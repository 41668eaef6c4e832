import { ShapeMismatchError } from '../../lib/errors';
import { imageDetailStatus, isMirrorMode, modeListPoolStatus } from '../../types/rbd/mirror-status';
import type { ImageStatus, ResourceEntry } from '../../types/rbd/mirror-status';
import { decodeStatus, validateStatus } from './decode';
import type { StatusShapeStrategy, StrategyContext } from './types';

export function imageStatusArgs(pool: string, image: string): string[] {
  return ['mirror', 'image', 'status', `${pool}/${image}`, '--format', 'json'];
}

/**
 * Pool status lists `{ name, mode }` per image; stats come from a second
 * `rbd mirror image status` call per journal/snapshot image.
 */
export const modeListStrategy: StatusShapeStrategy = {
  shape: 'mode-list',

  listResources(payload: unknown): ResourceEntry[] {
    return validateStatus(payload, modeListPoolStatus, 'pool status').map((image) => ({
      name: image.name,
      mode: image.mode,
    }));
  },

  async resolveStatus(entry: ResourceEntry, ctx: StrategyContext): Promise<ImageStatus> {
    if (!isMirrorMode(entry.mode)) {
      return { kind: 'unknown', mode: entry.mode };
    }

    const raw = await ctx.fetcher.fetch(ctx.signal, [...ctx.clusterArgs, ...imageStatusArgs(ctx.pool, entry.name)]);
    const detail = decodeStatus(raw, imageDetailStatus, `image status ${entry.name}`);

    // The detail's own mode wins over the pool listing.
    switch (detail.mode) {
      case 'journal': {
        const stats = detail.replaying_status;
        if (!stats) throw new ShapeMismatchError(entry.name, detail.mode, 'replaying_status');
        return {
          kind: 'replaying',
          bytesPerSecond: stats.bytes_per_second,
          entriesBehindPrimary: stats.entries_behind_primary,
          entriesPerSecond: stats.entries_per_second,
          secondsUntilSynced: stats.seconds_until_synced,
        };
      }
      case 'snapshot': {
        const stats = detail.snapshot_status;
        if (!stats) throw new ShapeMismatchError(entry.name, detail.mode, 'snapshot_status');
        return {
          kind: 'snapshot',
          bytesPerSnapshot: stats.bytes_per_snapshot,
          lastSnapshotBytes: stats.last_snapshot_bytes,
          lastSnapshotSyncSeconds: stats.last_snapshot_sync_seconds,
          progress: {
            syncPercent: stats.sync_percent,
            secondsUntilSynced: stats.seconds_until_synced,
          },
        };
      }
      default:
        return { kind: 'unknown', mode: detail.mode };
    }
  },
};
