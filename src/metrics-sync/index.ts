export { default, type MetricsSyncOptions } from './metrics-sync';
