export { default, type ObjectLister, type ClusterClientConfig, LISTING_ERROR, OPERATORS_API_PATH } from './cluster-client';
