import {
  csvAbnormalLabels,
  csvSucceededLabels,
  sameLabels,
  sameSyncRecord,
  subscriptionSyncLabels,
  subscriptionSyncRecord,
} from './metric-labels';

describe('metric labels', () => {
  it('builds CSV label sets with empty values for missing fields', () => {
    const csv = { metadata: { name: 'etcdoperator.v0.9.4' } };

    expect(csvSucceededLabels(csv)).toEqual({ namespace: '', name: 'etcdoperator.v0.9.4', version: '' });
    expect(csvAbnormalLabels(csv)).toEqual({ namespace: '', name: 'etcdoperator.v0.9.4', version: '', phase: '', reason: '' });
  });

  it('builds CSV label sets from spec and status', () => {
    const csv = {
      metadata: { name: 'etcdoperator.v0.9.4', namespace: 'operators' },
      spec: { version: '0.9.4' },
      status: { phase: 'Failed', reason: 'InstallCheckFailed' },
    };

    expect(csvAbnormalLabels(csv)).toEqual({
      namespace: 'operators', name: 'etcdoperator.v0.9.4', version: '0.9.4', phase: 'Failed', reason: 'InstallCheckFailed',
    });
  });

  it('has no sync record for a subscription without spec', () => {
    expect(subscriptionSyncRecord({ metadata: { name: 'etcd-sub' } })).toBeUndefined();
  });

  it('maps a subscription to its sync counter labels', () => {
    const record = subscriptionSyncRecord({
      metadata: { name: 'etcd-sub' },
      spec: { name: 'etcd', channel: 'stable' },
      status: { installedCSV: 'etcdoperator.v0.9.4' },
    });

    expect(record).toEqual({ installedCSV: 'etcdoperator.v0.9.4', channel: 'stable', packageName: 'etcd' });
    expect(record && subscriptionSyncLabels('etcd-sub', record)).toEqual({
      name: 'etcd-sub', installed: 'etcdoperator.v0.9.4', channel: 'stable', package: 'etcd',
    });
  });

  it('compares label sets over every key', () => {
    expect(sameLabels({ a: '1', b: '2' }, { b: '2', a: '1' })).toBe(true);
    expect(sameLabels({ a: '1' }, { a: '1', b: '' })).toBe(false);
    expect(sameLabels({ a: '1' }, { a: '2' })).toBe(false);
  });

  it('compares sync records field by field', () => {
    const record = { installedCSV: '', channel: 'stable', packageName: 'etcd' };

    expect(sameSyncRecord(record, { ...record })).toBe(true);
    expect(sameSyncRecord(record, { ...record, channel: 'alpha' })).toBe(false);
  });
});
