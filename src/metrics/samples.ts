import type { ReplayingStatus, SnapshotStatus } from '../types/rbd/mirror-status';
import type { MetricKey, MetricSchema } from './schema';

export const BYTES_PER_MIB = 1_048_576;

export type MetricLabels = Readonly<Record<string, string>>;

export type MetricSample = Readonly<{
  key: MetricKey;
  name: string;
  labels: MetricLabels;
  value: number;
}>;

/** Receives samples one at a time as the collector produces them. */
export interface MetricSink {
  emit(sample: MetricSample): void;
}

export type ImageLabels = {
  cluster?: string;
  pool: string;
  image: string;
};

export function toMiB(bytes: number): number {
  return bytes / BYTES_PER_MIB;
}

/** Transfer rate of the last snapshot in MiB/s; 0 when it took no measurable time. */
export function snapshotSpeedMiB(lastSnapshotBytes: number, lastSnapshotSyncSeconds: number): number {
  if (!(lastSnapshotSyncSeconds > 0)) return 0;
  return lastSnapshotBytes / lastSnapshotSyncSeconds / BYTES_PER_MIB;
}

function finite(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

/**
 * Every sample for one image, in registry order. The caller emits them only once the whole
 * set is built so an image never shows up with half its series.
 */
export function buildImageSamples(
  schema: MetricSchema,
  status: ReplayingStatus | SnapshotStatus,
  image: ImageLabels
): MetricSample[] {
  const base: Record<string, string> = {};
  if (schema.clusterLabel) base.cluster = image.cluster ?? '';
  base.pool = image.pool;
  base.image = image.image;

  const samples: MetricSample[] = [];
  const push = (key: MetricKey, value: number, extra?: Record<string, string>) => {
    const descriptor = schema.require(key);
    samples.push({ key, name: descriptor.name, labels: { ...base, ...extra }, value: finite(value) });
  };

  if (status.kind === 'replaying') {
    push('journalSpeed', toMiB(status.bytesPerSecond));
    push('journalEntriesBehind', status.entriesBehindPrimary);
    push('journalEntriesPerSec', status.entriesPerSecond);
    push('journalSecondsUntilSynced', status.secondsUntilSynced);
    return samples;
  }

  if (status.progress) {
    push('snapshotSyncPercent', status.progress.syncPercent);
  }
  push('snapshotSpeed', snapshotSpeedMiB(status.lastSnapshotBytes, status.lastSnapshotSyncSeconds));
  if (status.progress) {
    push('snapshotSecondsUntilSynced', status.progress.secondsUntilSynced);
  }
  push('snapshotBytesPerSnapshot', toMiB(status.bytesPerSnapshot));
  push('snapshotLastSnapshotBytes', toMiB(status.lastSnapshotBytes));
  push('snapshotLastSnapshotSyncSeconds', status.lastSnapshotSyncSeconds);
  if (status.replication) {
    push('snapshotReplicationState', status.replication.healthy ? 1 : 0, { state: status.replication.state });
  }
  if (status.lastUpdateEpoch !== undefined) {
    push('snapshotLastUpdateTimestamp', status.lastUpdateEpoch);
  }
  return samples;
}
