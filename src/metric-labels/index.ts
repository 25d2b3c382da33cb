export * from './metric-labels';
