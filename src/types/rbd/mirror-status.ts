import { z } from 'zod';

export const STATUS_SHAPES = ['auto', 'mode-list', 'peer-description'] as const;
export type StatusShape = (typeof STATUS_SHAPES)[number];

export type MirrorMode = 'journal' | 'snapshot';

// Passed to rbd as `--cluster <name>`; must not look like another flag.
export const CLUSTER_NAME_PATTERN = '^[A-Za-z0-9][A-Za-z0-9_.-]*$';

// Absent counters read as zero, the same as rbd's own JSON consumers do.
const gauge = z.number().finite().default(0);

// ---- mode-list shape ----

const modeListImage = z.object({
  name: z.string().min(1),
  mode: z.string().optional(),
});

export const modeListPoolStatus = z
  .union([z.array(modeListImage), z.object({ images: z.array(modeListImage) })])
  .transform((value) => (Array.isArray(value) ? value : value.images));

export const replayingStatus = z.object({
  bytes_per_second: gauge,
  entries_behind_primary: gauge,
  entries_per_second: gauge,
  seconds_until_synced: gauge,
});

export const snapshotStatus = z.object({
  sync_percent: gauge,
  seconds_until_synced: gauge,
  bytes_per_snapshot: gauge,
  last_snapshot_bytes: gauge,
  last_snapshot_sync_seconds: gauge,
});

export const imageDetailStatus = z.object({
  mode: z.string().optional(),
  replaying_status: replayingStatus.optional(),
  snapshot_status: snapshotStatus.optional(),
});

// ---- peer-description shape (`rbd mirror pool status --verbose`) ----

export const peerSite = z.object({
  site_name: z.string().optional(),
  state: z.string().optional(),
  description: z.string().default(''),
  last_update: z.string().optional(),
});

const peerDescriptionImage = z.object({
  name: z.string().min(1),
  peer_sites: z.array(peerSite).default([]),
});

export const peerDescriptionPoolStatus = z.object({
  images: z.array(peerDescriptionImage).default([]),
});

export const peerSnapshotStats = z.object({
  bytes_per_second: gauge,
  bytes_per_snapshot: gauge,
  last_snapshot_bytes: gauge,
  last_snapshot_sync_seconds: gauge,
});

export type PeerSite = z.infer<typeof peerSite>;

// ---- resolved per-scrape model ----

export type ResourceEntry = {
  name: string;
  mode: string | undefined;
  peerSite?: PeerSite;
};

export type ReplayingStatus = {
  kind: 'replaying';
  bytesPerSecond: number;
  entriesBehindPrimary: number;
  entriesPerSecond: number;
  secondsUntilSynced: number;
};

export type SnapshotStatus = {
  kind: 'snapshot';
  bytesPerSnapshot: number;
  lastSnapshotBytes: number;
  lastSnapshotSyncSeconds: number;
  progress?: { syncPercent: number; secondsUntilSynced: number };
  replication?: { state: string; healthy: boolean };
  lastUpdateEpoch?: number;
};

export type UnknownStatus = {
  kind: 'unknown';
  mode: string | undefined;
};

export type ImageStatus = ReplayingStatus | SnapshotStatus | UnknownStatus;

export function isMirrorMode(mode: string | undefined): mode is MirrorMode {
  return mode === 'journal' || mode === 'snapshot';
}
