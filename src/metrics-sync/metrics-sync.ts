import { type Registry, register } from 'prom-client';

import { ClusterObjectKind, type ClusterServiceVersion, type Subscription } from '../cluster-objects';
import { type ObjectLister } from '../cluster-client';
import CsvMetrics from '../csv-metrics';
import logger from '../logger';
import { createCatalogMetrics, createOlmMetrics, MetricsComponent } from '../metrics';
import {
  CatalogSourceCountGauge,
  CsvCountGauge,
  InstallPlanCountGauge,
  NoOpSnapshotGauge,
  SubscriptionCountGauge,
  type SnapshotGauge,
} from '../snapshot-gauges';
import SubscriptionMetrics, { SubscriptionSyncDirectory } from '../subscription-metrics';

export interface MetricsSyncOptions {
  registry?: Registry
  snapshotKinds?: ClusterObjectKind[]
  component?: MetricsComponent
}

/**
 * Entry point for the reconcile loop. Each `on*` call is synchronous and safe to repeat
 * for the same object, since removing a series that does not exist does nothing. Calls
 * for a metric group the process did not register are ignored.
 */
export default class MetricsSync {
  private readonly logger: typeof logger;

  constructor (
    private readonly snapshotGauges: SnapshotGauge[],
    private readonly csvMetrics: CsvMetrics | undefined,
    private readonly subscriptionMetrics: SubscriptionMetrics | undefined,
  ) {
    this.logger = logger.child({ service: this.constructor.name });
  }

  static create (lister: ObjectLister, options: MetricsSyncOptions = {}): MetricsSync {
    const registry = options.registry ?? register;
    const enabledKinds = options.snapshotKinds ?? Object.values(ClusterObjectKind);
    const component = options.component ?? MetricsComponent.ALL;
    const olmMetrics = component !== MetricsComponent.CATALOG ? createOlmMetrics(registry) : undefined;
    const catalogMetrics = component !== MetricsComponent.OLM ? createCatalogMetrics(registry) : undefined;

    const snapshotGauge = (kind: ClusterObjectKind): SnapshotGauge => {
      if (enabledKinds.includes(kind)) {
        if (kind === ClusterObjectKind.CLUSTER_SERVICE_VERSION && olmMetrics !== undefined) {
          return new CsvCountGauge(lister, olmMetrics);
        }
        if (catalogMetrics !== undefined) {
          switch (kind) {
            case ClusterObjectKind.INSTALL_PLAN:
              return new InstallPlanCountGauge(lister, catalogMetrics);
            case ClusterObjectKind.SUBSCRIPTION:
              return new SubscriptionCountGauge(lister, catalogMetrics);
            case ClusterObjectKind.CATALOG_SOURCE:
              return new CatalogSourceCountGauge(lister, catalogMetrics);
          }
        }
      }
      return new NoOpSnapshotGauge();
    };

    return new MetricsSync(
      Object.values(ClusterObjectKind).map(snapshotGauge),
      olmMetrics && new CsvMetrics(olmMetrics),
      catalogMetrics && new SubscriptionMetrics(new SubscriptionSyncDirectory(), catalogMetrics.SUBSCRIPTION_SYNC_COUNT),
    );
  }

  async refreshSnapshots (): Promise<void> {
    const counts = await Promise.all(this.snapshotGauges.map(async gauge => await gauge.refresh()));
    this.logger.debug(`Refreshed snapshot gauges: ${counts.join(', ')}`);
  }

  onCsvTransition (oldCsv: ClusterServiceVersion | undefined, newCsv: ClusterServiceVersion | undefined): void {
    this.csvMetrics?.emitTransition(oldCsv, newCsv);
  }

  onCsvDelete (oldCsv: ClusterServiceVersion): void {
    this.csvMetrics?.deleteCsv(oldCsv);
  }

  onSubscriptionSync (sub: Subscription): void {
    this.subscriptionMetrics?.emitSync(sub);
  }

  onSubscriptionReconcile (sub: Subscription): void {
    this.subscriptionMetrics?.reconcile(sub);
  }

  onSubscriptionDelete (sub: Subscription): void {
    this.subscriptionMetrics?.deleteSubscription(sub);
  }

  incrementUpgradeCounter (): void {
    this.csvMetrics?.incrementUpgradeCount();
  }
}
