import { trace } from '@opentelemetry/api';
import { type Gauge } from 'prom-client';

import { ClusterObjectKind } from '../cluster-objects';
import { type ObjectLister } from '../cluster-client';
import { type CatalogMetrics, type OlmMetrics } from '../metrics';
import { wrapSpan } from '../utility';

export interface SnapshotGauge {
  refresh: () => Promise<number>
}

/**
 * Re-counts every object of one kind and overwrites the kind's gauge. The gauges carry no
 * labels, so a refresh never leaves a stale series behind. Listing errors reach the
 * caller untouched and leave the previous value in place.
 */
export class ObjectCountGauge implements SnapshotGauge {
  tracer = trace.getTracer('olm-metrics-snapshot-gauges');

  constructor (
    public readonly kind: ClusterObjectKind,
    private readonly lister: ObjectLister,
    private readonly gauge: Gauge,
  ) {}

  async refresh (): Promise<number> {
    return await wrapSpan(async () => {
      const objects = await this.lister.list(this.kind);
      this.gauge.set(objects.length);
      return objects.length;
    }, this.tracer, `refresh ${this.kind} count`);
  }
}

export class CsvCountGauge extends ObjectCountGauge {
  constructor (lister: ObjectLister, metrics: Pick<OlmMetrics, 'CSV_COUNT'>) {
    super(ClusterObjectKind.CLUSTER_SERVICE_VERSION, lister, metrics.CSV_COUNT);
  }
}

export class InstallPlanCountGauge extends ObjectCountGauge {
  constructor (lister: ObjectLister, metrics: Pick<CatalogMetrics, 'INSTALL_PLAN_COUNT'>) {
    super(ClusterObjectKind.INSTALL_PLAN, lister, metrics.INSTALL_PLAN_COUNT);
  }
}

export class SubscriptionCountGauge extends ObjectCountGauge {
  constructor (lister: ObjectLister, metrics: Pick<CatalogMetrics, 'SUBSCRIPTION_COUNT'>) {
    super(ClusterObjectKind.SUBSCRIPTION, lister, metrics.SUBSCRIPTION_COUNT);
  }
}

export class CatalogSourceCountGauge extends ObjectCountGauge {
  constructor (lister: ObjectLister, metrics: Pick<CatalogMetrics, 'CATALOG_SOURCE_COUNT'>) {
    super(ClusterObjectKind.CATALOG_SOURCE, lister, metrics.CATALOG_SOURCE_COUNT);
  }
}
