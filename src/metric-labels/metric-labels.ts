import { type ClusterServiceVersion, type Subscription } from '../cluster-objects';

export const LABELS = {
  NAME: 'name',
  INSTALLED: 'installed',
  NAMESPACE: 'namespace',
  CHANNEL: 'channel',
  VERSION: 'version',
  PHASE: 'phase',
  REASON: 'reason',
  PACKAGE: 'package',
} as const;

export const CSV_SUCCEEDED_LABELS = [LABELS.NAMESPACE, LABELS.NAME, LABELS.VERSION] as const;
export const CSV_ABNORMAL_LABELS = [...CSV_SUCCEEDED_LABELS, LABELS.PHASE, LABELS.REASON] as const;
export const SUBSCRIPTION_SYNC_LABELS = [LABELS.NAME, LABELS.INSTALLED, LABELS.CHANNEL, LABELS.PACKAGE] as const;

export type CsvSucceededLabel = typeof CSV_SUCCEEDED_LABELS[number];
export type CsvAbnormalLabel = typeof CSV_ABNORMAL_LABELS[number];
export type SubscriptionSyncLabel = typeof SUBSCRIPTION_SYNC_LABELS[number];

export type LabelSet<T extends string> = Record<T, string>;

export interface SubscriptionSyncRecord {
  installedCSV: string
  channel: string
  packageName: string
}

export function csvSucceededLabels (csv: ClusterServiceVersion): LabelSet<CsvSucceededLabel> {
  return {
    namespace: csv.metadata.namespace ?? '',
    name: csv.metadata.name,
    version: csv.spec?.version ?? '',
  };
}

export function csvAbnormalLabels (csv: ClusterServiceVersion): LabelSet<CsvAbnormalLabel> {
  return {
    ...csvSucceededLabels(csv),
    phase: csv.status?.phase ?? '',
    reason: csv.status?.reason ?? '',
  };
}

/**
 * Label values a subscription's sync counter is published under. Undefined while the
 * subscription has no spec, as there is nothing to track yet.
 */
export function subscriptionSyncRecord (sub: Subscription): SubscriptionSyncRecord | undefined {
  if (sub.spec === undefined) {
    return undefined;
  }
  return {
    installedCSV: sub.status?.installedCSV ?? '',
    channel: sub.spec.channel ?? '',
    packageName: sub.spec.name,
  };
}

export function subscriptionSyncLabels (name: string, record: SubscriptionSyncRecord): LabelSet<SubscriptionSyncLabel> {
  return {
    name,
    installed: record.installedCSV,
    channel: record.channel,
    package: record.packageName,
  };
}

export function sameLabels (a: Record<string, string>, b: Record<string, string>): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  return [...keys].every(key => a[key] === b[key]);
}

export function sameSyncRecord (a: SubscriptionSyncRecord, b: SubscriptionSyncRecord): boolean {
  return a.installedCSV === b.installedCSV &&
    a.channel === b.channel &&
    a.packageName === b.packageName;
}
