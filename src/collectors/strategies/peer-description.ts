import { StatusDecodeError } from '../../lib/errors';
import { peerDescriptionPoolStatus, peerSnapshotStats } from '../../types/rbd/mirror-status';
import type { ImageStatus, ResourceEntry, SnapshotStatus } from '../../types/rbd/mirror-status';
import { parseJsonText, validateStatus } from './decode';
import type { StatusShapeStrategy } from './types';

const LAST_UPDATE_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * `2024-01-15 10:30:45` -> unix seconds, read as UTC. Anything else is undefined.
 */
export function parseLastUpdate(text: string | undefined): number | undefined {
  if (!text) return undefined;
  const match = LAST_UPDATE_RE.exec(text.trim());
  if (!match) return undefined;
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(ms);
  // Date.UTC rolls 2024-02-31 over into March and maps years 0-99 to 19xx; reject both.
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return undefined;
  return ms / 1000;
}

// TODO: confirm the full set of peer state strings against a live rbd-mirror before relying on this.
export function isReplaying(state: string): boolean {
  return state.includes('replaying');
}

export function extractStatsFragment(image: string, description: string): string {
  const idx = description.indexOf('{');
  if (idx === -1) {
    throw new StatusDecodeError(`peer description of ${image}`, 'no stats fragment');
  }
  return description.slice(idx);
}

/**
 * `rbd mirror pool status --verbose` embeds each image's stats as JSON inside the first peer
 * site's free-text description, so one call covers the whole pool.
 */
export const peerDescriptionStrategy: StatusShapeStrategy = {
  shape: 'peer-description',

  listResources(payload: unknown): ResourceEntry[] {
    return validateStatus(payload, peerDescriptionPoolStatus, 'pool status').images.map((image) => ({
      name: image.name,
      mode: undefined,
      peerSite: image.peer_sites[0],
    }));
  },

  async resolveStatus(entry: ResourceEntry): Promise<ImageStatus> {
    const site = entry.peerSite;
    if (!site) {
      return { kind: 'unknown', mode: entry.mode };
    }

    const subject = `peer description of ${entry.name}`;
    const fragment = extractStatsFragment(entry.name, site.description);
    const stats = validateStatus(parseJsonText(fragment, subject), peerSnapshotStats, subject);

    const status: SnapshotStatus = {
      kind: 'snapshot',
      bytesPerSnapshot: stats.bytes_per_snapshot,
      lastSnapshotBytes: stats.last_snapshot_bytes,
      lastSnapshotSyncSeconds: stats.last_snapshot_sync_seconds,
    };
    if (site.state) {
      status.replication = { state: site.state, healthy: isReplaying(site.state) };
    }
    const lastUpdate = parseLastUpdate(site.last_update);
    if (lastUpdate !== undefined) {
      status.lastUpdateEpoch = lastUpdate;
    }
    return status;
  },
};
