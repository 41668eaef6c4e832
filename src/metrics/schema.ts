import type { StatusShape } from '../types/rbd/mirror-status';

export const DEFAULT_METRIC_PREFIX = 'ceph_vm_';

export const METRIC_KEYS = [
  'journalSpeed',
  'journalEntriesBehind',
  'journalEntriesPerSec',
  'journalSecondsUntilSynced',
  'snapshotSyncPercent',
  'snapshotSpeed',
  'snapshotSecondsUntilSynced',
  'snapshotBytesPerSnapshot',
  'snapshotLastSnapshotBytes',
  'snapshotLastSnapshotSyncSeconds',
  'snapshotReplicationState',
  'snapshotLastUpdateTimestamp',
] as const;

export type MetricKey = (typeof METRIC_KEYS)[number];

type Family = 'mode-list' | 'peer-description';

export type MetricDescriptor = Readonly<{
  key: MetricKey;
  name: string;
  help: string;
  labelNames: readonly string[];
}>;

type DescriptorTemplate = {
  suffix: string;
  help: string;
  families: readonly Family[];
  extraLabels?: readonly string[];
};

const MODE_LIST: readonly Family[] = ['mode-list'];
const PEER: readonly Family[] = ['peer-description'];
const BOTH: readonly Family[] = ['mode-list', 'peer-description'];

// Names are part of the dashboard contract; do not rename.
const TEMPLATES: Record<MetricKey, DescriptorTemplate> = {
  journalSpeed: { suffix: 'journal_speed_mib_per_sec', help: 'Journal replay speed (MiB/s)', families: MODE_LIST },
  journalEntriesBehind: {
    suffix: 'journal_entries_behind_primary',
    help: 'Journal entries behind primary',
    families: MODE_LIST,
  },
  journalEntriesPerSec: {
    suffix: 'journal_entries_per_sec',
    help: 'Journal entries replayed per second',
    families: MODE_LIST,
  },
  journalSecondsUntilSynced: {
    suffix: 'journal_seconds_until_synced',
    help: 'Estimated seconds until journal is synced',
    families: MODE_LIST,
  },
  snapshotSyncPercent: { suffix: 'snapshot_sync_percent', help: 'Snapshot sync progress (%)', families: MODE_LIST },
  snapshotSpeed: { suffix: 'snapshot_speed_mib_per_sec', help: 'Snapshot sync speed (MiB/s)', families: BOTH },
  snapshotSecondsUntilSynced: {
    suffix: 'snapshot_seconds_until_synced',
    help: 'Estimated seconds until snapshot is synced',
    families: MODE_LIST,
  },
  snapshotBytesPerSnapshot: {
    suffix: 'snapshot_bytes_per_snapshot_mib',
    help: 'Bytes per snapshot (MiB)',
    families: BOTH,
  },
  snapshotLastSnapshotBytes: {
    suffix: 'snapshot_last_snapshot_bytes_mib',
    help: 'Last snapshot size transferred (MiB)',
    families: BOTH,
  },
  snapshotLastSnapshotSyncSeconds: {
    suffix: 'snapshot_last_snapshot_sync_seconds',
    help: 'Duration of last snapshot sync (s)',
    families: BOTH,
  },
  snapshotReplicationState: {
    suffix: 'snapshot_replication_state',
    help: 'Replication state (1 = replaying)',
    families: PEER,
    extraLabels: ['state'],
  },
  snapshotLastUpdateTimestamp: {
    suffix: 'snapshot_last_update_timestamp',
    help: 'Last status update (unix seconds)',
    families: PEER,
  },
};

export type MetricSchemaOptions = {
  prefix?: string;
  clusterLabel?: boolean;
  shape?: StatusShape;
};

/**
 * Descriptor table shared by every scrape. Built once; nothing on it changes afterwards.
 */
export class MetricSchema {
  readonly prefix: string;
  readonly clusterLabel: boolean;
  readonly baseLabelNames: readonly string[];
  private readonly descriptors: ReadonlyMap<MetricKey, MetricDescriptor>;

  constructor(options: MetricSchemaOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_METRIC_PREFIX;
    this.clusterLabel = options.clusterLabel ?? false;
    this.baseLabelNames = Object.freeze(this.clusterLabel ? ['cluster', 'pool', 'image'] : ['pool', 'image']);

    const shape = options.shape ?? 'auto';
    const descriptors = new Map<MetricKey, MetricDescriptor>();
    for (const key of METRIC_KEYS) {
      const template = TEMPLATES[key];
      if (shape !== 'auto' && !template.families.includes(shape)) continue;
      descriptors.set(
        key,
        Object.freeze({
          key,
          name: `${this.prefix}${template.suffix}`,
          help: template.help,
          labelNames: Object.freeze([...this.baseLabelNames, ...(template.extraLabels ?? [])]),
        })
      );
    }
    this.descriptors = descriptors;
  }

  list(): MetricDescriptor[] {
    return [...this.descriptors.values()];
  }

  has(key: MetricKey): boolean {
    return this.descriptors.has(key);
  }

  require(key: MetricKey): MetricDescriptor {
    const descriptor = this.descriptors.get(key);
    if (!descriptor) {
      throw new Error(`metric ${key} is not registered for this status shape`);
    }
    return descriptor;
  }
}
