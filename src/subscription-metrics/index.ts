export { default } from './subscription-metrics';
export { default as SubscriptionSyncDirectory } from './subscription-sync-directory';
