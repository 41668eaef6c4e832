import { describe, expect, it } from 'vitest';

import { MetricSchema } from './schema';

describe('MetricSchema', () => {
  it('registers every family under auto with the default prefix', () => {
    const schema = new MetricSchema();
    expect(schema.list().map((d) => d.name)).toEqual([
      'ceph_vm_journal_speed_mib_per_sec',
      'ceph_vm_journal_entries_behind_primary',
      'ceph_vm_journal_entries_per_sec',
      'ceph_vm_journal_seconds_until_synced',
      'ceph_vm_snapshot_sync_percent',
      'ceph_vm_snapshot_speed_mib_per_sec',
      'ceph_vm_snapshot_seconds_until_synced',
      'ceph_vm_snapshot_bytes_per_snapshot_mib',
      'ceph_vm_snapshot_last_snapshot_bytes_mib',
      'ceph_vm_snapshot_last_snapshot_sync_seconds',
      'ceph_vm_snapshot_replication_state',
      'ceph_vm_snapshot_last_update_timestamp',
    ]);
  });

  it('limits the peer-description shape to its snapshot metrics', () => {
    const schema = new MetricSchema({ shape: 'peer-description', prefix: 'rbd_' });
    expect(schema.list().map((d) => d.key)).toEqual([
      'snapshotSpeed',
      'snapshotBytesPerSnapshot',
      'snapshotLastSnapshotBytes',
      'snapshotLastSnapshotSyncSeconds',
      'snapshotReplicationState',
      'snapshotLastUpdateTimestamp',
    ]);
    expect(schema.require('snapshotSpeed').name).toBe('rbd_snapshot_speed_mib_per_sec');
    expect(schema.has('journalSpeed')).toBe(false);
    expect(() => schema.require('journalSpeed')).toThrow('metric journalSpeed is not registered for this status shape');
  });

  it('leaves the peer-only metrics out of the mode-list shape', () => {
    const schema = new MetricSchema({ shape: 'mode-list' });
    expect(schema.list()).toHaveLength(10);
    expect(schema.has('snapshotReplicationState')).toBe(false);
    expect(schema.has('snapshotLastUpdateTimestamp')).toBe(false);
  });

  it('adds the cluster label in front and the state label on replication state', () => {
    const plain = new MetricSchema();
    expect(plain.require('journalSpeed').labelNames).toEqual(['pool', 'image']);
    expect(plain.require('snapshotReplicationState').labelNames).toEqual(['pool', 'image', 'state']);

    const clustered = new MetricSchema({ clusterLabel: true });
    expect(clustered.require('journalSpeed').labelNames).toEqual(['cluster', 'pool', 'image']);
    expect(clustered.require('snapshotReplicationState').labelNames).toEqual(['cluster', 'pool', 'image', 'state']);
  });

  it('hands out frozen descriptors', () => {
    const descriptor = new MetricSchema().require('snapshotSpeed');
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.labelNames)).toBe(true);
  });
});
