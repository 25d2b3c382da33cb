export * from './snapshot-gauges';
export { default as NoOpSnapshotGauge } from './no-op-snapshot-gauge';
