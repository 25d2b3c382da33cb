import { type SubscriptionSyncRecord } from '../metric-labels';

/**
 * Last label values each subscription's sync counter was published under, keyed by
 * subscription name. One instance is created at startup and shared by every caller.
 */
export default class SubscriptionSyncDirectory {
  private readonly records = new Map<string, SubscriptionSyncRecord>();

  get (name: string): SubscriptionSyncRecord | undefined {
    return this.records.get(name);
  }

  has (name: string): boolean {
    return this.records.has(name);
  }

  set (name: string, record: SubscriptionSyncRecord): void {
    this.records.set(name, { ...record });
  }

  purge (name: string): boolean {
    return this.records.delete(name);
  }

  get size (): number {
    return this.records.size;
  }
}
