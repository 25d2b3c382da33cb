import { type Counter } from 'prom-client';

import { type Subscription } from '../cluster-objects';
import logger from '../logger';
import {
  sameSyncRecord,
  subscriptionSyncLabels,
  subscriptionSyncRecord,
  type SubscriptionSyncLabel,
} from '../metric-labels';
import type SubscriptionSyncDirectory from './subscription-sync-directory';

/**
 * Keeps at most one `subscription_sync_total` series alive per subscription. Counting
 * happens in `emitSync`; `reconcile` only notices label drift, drops the series for the
 * old labels and records the new ones. Subscriptions without a spec are ignored by
 * every operation.
 */
export default class SubscriptionMetrics {
  private readonly logger: typeof logger;

  constructor (
    private readonly directory: SubscriptionSyncDirectory,
    private readonly counter: Counter<SubscriptionSyncLabel>,
  ) {
    this.logger = logger.child({ service: this.constructor.name });
  }

  emitSync (sub: Subscription): void {
    const record = subscriptionSyncRecord(sub);
    if (record === undefined) {
      this.logger.debug(`Skipping sync count for subscription ${sub.metadata.name} without spec`);
      return;
    }

    const name = sub.metadata.name;
    this.counter.labels(subscriptionSyncLabels(name, record)).inc();
    if (!this.directory.has(name)) {
      this.directory.set(name, record);
    }
  }

  reconcile (sub: Subscription): void {
    const record = subscriptionSyncRecord(sub);
    if (record === undefined) {
      return;
    }

    const name = sub.metadata.name;
    const stored = this.directory.get(name);
    if (stored === undefined) {
      this.directory.set(name, record);
      return;
    }
    if (sameSyncRecord(stored, record)) {
      return;
    }

    this.counter.remove(subscriptionSyncLabels(name, stored));
    this.directory.set(name, record);
    this.logger.debug(`Subscription ${name} moved from ${stored.packageName}/${stored.channel} to ${record.packageName}/${record.channel}`);
  }

  // Drops the series under the current labels and under the recorded ones, which differ
  // when the subscription drifted and was deleted before being reconciled.
  deleteSubscription (sub: Subscription): void {
    const record = subscriptionSyncRecord(sub);
    if (record === undefined) {
      return;
    }

    const name = sub.metadata.name;
    const stored = this.directory.get(name);
    this.counter.remove(subscriptionSyncLabels(name, record));
    if (stored !== undefined && !sameSyncRecord(stored, record)) {
      this.counter.remove(subscriptionSyncLabels(name, stored));
    }
    this.directory.purge(name);
  }
}
