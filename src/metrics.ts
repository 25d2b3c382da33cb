import express from 'express';
import { type Server } from 'http';
import { Counter, Gauge, type Registry, register } from 'prom-client';

import logger from './logger';
import {
  CSV_ABNORMAL_LABELS,
  CSV_SUCCEEDED_LABELS,
  SUBSCRIPTION_SYNC_LABELS,
  type CsvAbnormalLabel,
  type CsvSucceededLabel,
  type SubscriptionSyncLabel,
} from './metric-labels';
import { wrapErrorSync } from './utility';

const LOGS_COUNT = new Counter({
  name: 'olm_metrics_logs_count',
  help: 'Number of messages logged',
  labelNames: ['level'],
});

export const METRICS = {
  LOGS_COUNT,
};

// The olm group belongs to the process managing CSVs, the catalog group to the one
// resolving subscriptions. `all` runs both in one process.
export enum MetricsComponent {
  OLM = 'olm',
  CATALOG = 'catalog',
  ALL = 'all',
}

export interface OlmMetrics {
  CSV_COUNT: Gauge
  CSV_SUCCEEDED: Gauge<CsvSucceededLabel>
  CSV_ABNORMAL: Gauge<CsvAbnormalLabel>
  CSV_UPGRADE_COUNT: Counter
}

export interface CatalogMetrics {
  INSTALL_PLAN_COUNT: Gauge
  SUBSCRIPTION_COUNT: Gauge
  CATALOG_SOURCE_COUNT: Gauge
  SUBSCRIPTION_SYNC_COUNT: Counter<SubscriptionSyncLabel>
}

export const DUPLICATE_REGISTRATION_ERROR = 'DuplicateRegistrationError';

// prom-client refuses a second metric under a name the registry already holds.
// Both groups are created at startup, so a clash is fatal.
export const createOlmMetrics = (registry: Registry = register): OlmMetrics => wrapErrorSync(() => ({
  CSV_COUNT: new Gauge({
    name: 'csv_count',
    help: 'Number of CSVs successfully registered',
    registers: [registry],
  }),
  CSV_SUCCEEDED: new Gauge({
    name: 'csv_succeeded',
    help: 'Successful CSV install',
    labelNames: CSV_SUCCEEDED_LABELS,
    registers: [registry],
  }),
  CSV_ABNORMAL: new Gauge({
    name: 'csv_abnormal',
    help: 'CSV is not installed',
    labelNames: CSV_ABNORMAL_LABELS,
    registers: [registry],
  }),
  CSV_UPGRADE_COUNT: new Counter({
    name: 'csv_upgrade_count',
    help: 'Monotonic count of CSV upgrades',
    registers: [registry],
  }),
}), 'Failed to register olm metrics', DUPLICATE_REGISTRATION_ERROR);

export const createCatalogMetrics = (registry: Registry = register): CatalogMetrics => wrapErrorSync(() => ({
  INSTALL_PLAN_COUNT: new Gauge({
    name: 'install_plan_count',
    help: 'Number of install plans',
    registers: [registry],
  }),
  SUBSCRIPTION_COUNT: new Gauge({
    name: 'subscription_count',
    help: 'Number of subscriptions',
    registers: [registry],
  }),
  CATALOG_SOURCE_COUNT: new Gauge({
    name: 'catalog_source_count',
    help: 'Number of catalog sources',
    registers: [registry],
  }),
  SUBSCRIPTION_SYNC_COUNT: new Counter({
    name: 'subscription_sync_total',
    help: 'Monotonic count of subscription syncs',
    labelNames: SUBSCRIPTION_SYNC_LABELS,
    registers: [registry],
  }),
}), 'Failed to register catalog metrics', DUPLICATE_REGISTRATION_ERROR);

export const createMetricsApp = (registry: Registry = register): express.Express => {
  const app = express();

  app.get('/metrics', (_req, res, next) => {
    registry.metrics()
      .then((metrics) => {
        res.set('Content-Type', registry.contentType);
        res.send(metrics);
      })
      .catch(next);
  });

  return app;
};

export const startServer = (port: number, registry: Registry = register): Server => {
  return createMetricsApp(registry).listen(port, () => {
    logger.info(`Metrics server running on http://localhost:${port}`);
  });
};
