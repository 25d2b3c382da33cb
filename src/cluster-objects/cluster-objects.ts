export enum ClusterObjectKind {
  CLUSTER_SERVICE_VERSION = 'ClusterServiceVersion',
  INSTALL_PLAN = 'InstallPlan',
  SUBSCRIPTION = 'Subscription',
  CATALOG_SOURCE = 'CatalogSource',
}

export const CSV_PHASE_SUCCEEDED = 'Succeeded';
// Set on the copies of a CSV placed into every namespace an operator group targets
export const CSV_REASON_COPIED = 'Copied';

export interface ObjectMeta {
  name: string
  namespace?: string
  uid?: string
  resourceVersion?: string
  labels?: Record<string, string>
}

export interface ClusterObject {
  apiVersion?: string
  kind?: string
  metadata: ObjectMeta
}

export interface ClusterServiceVersionSpec {
  version?: string
  displayName?: string
  replaces?: string
}

export interface ClusterServiceVersionStatus {
  phase?: string
  reason?: string
  message?: string
}

export interface ClusterServiceVersion extends ClusterObject {
  spec?: ClusterServiceVersionSpec
  status?: ClusterServiceVersionStatus
}

export interface SubscriptionSpec {
  // Package name
  name: string
  channel?: string
  source?: string
  sourceNamespace?: string
  startingCSV?: string
  installPlanApproval?: 'Automatic' | 'Manual'
}

export interface SubscriptionStatus {
  installedCSV?: string
  currentCSV?: string
  state?: string
}

export interface Subscription extends ClusterObject {
  spec?: SubscriptionSpec
  status?: SubscriptionStatus
}

export type InstallPlan = ClusterObject;
export type CatalogSource = ClusterObject;

export function isSucceededCsv (csv: ClusterServiceVersion): boolean {
  return csv.status?.phase === CSV_PHASE_SUCCEEDED;
}

export function isCopiedCsv (csv: ClusterServiceVersion): boolean {
  return csv.status?.reason === CSV_REASON_COPIED;
}
