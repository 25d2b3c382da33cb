export { default as MetricsSync, type MetricsSyncOptions } from './metrics-sync';
export { default as CsvMetrics } from './csv-metrics';
export { default as SubscriptionMetrics, SubscriptionSyncDirectory } from './subscription-metrics';
export * from './snapshot-gauges';
export { default as ClusterClient, type ObjectLister, type ClusterClientConfig, LISTING_ERROR } from './cluster-client';
export { default as OperatorConfig } from './operator-config';
export * from './cluster-objects';
export * from './metric-labels';
export {
  createCatalogMetrics,
  createOlmMetrics,
  createMetricsApp,
  startServer,
  DUPLICATE_REGISTRATION_ERROR,
  MetricsComponent,
  type CatalogMetrics,
  type OlmMetrics,
} from './metrics';
