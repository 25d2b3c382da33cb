export * from './cluster-objects';
