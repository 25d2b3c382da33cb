import assert from 'assert';

import { ClusterObjectKind } from '../cluster-objects';
import { MetricsComponent } from '../metrics';

export const SERVICE_ACCOUNT_TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';
export const SERVICE_ACCOUNT_CA_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/ca.crt';

const DEFAULT_PORT = 9090;
const DEFAULT_SNAPSHOT_REFRESH_INTERVAL_MS = 30_000;

function parsePositiveInteger (value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  assert(Number.isInteger(parsed) && parsed > 0, `${name} must be a positive integer, got '${value}'`);
  return parsed;
}

function parseBoolean (value: string | undefined, fallback: boolean, name: string): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  assert(['true', 'false', '1', '0'].includes(normalized), `${name} must be true or false, got '${value}'`);
  return normalized === 'true' || normalized === '1';
}

function parseMetricsComponent (value: string | undefined): MetricsComponent {
  if (value === undefined || value === '') {
    return MetricsComponent.ALL;
  }
  const match = Object.values(MetricsComponent).find(component => component === value.trim().toLowerCase());
  assert(match, `METRICS_COMPONENT must be one of ${Object.values(MetricsComponent).join(', ')}, got '${value}'`);
  return match;
}

function parseSnapshotKinds (value: string | undefined, enabled: boolean): ClusterObjectKind[] {
  const allKinds = Object.values(ClusterObjectKind);
  if (!enabled) {
    return [];
  }
  if (value === undefined) {
    return allKinds;
  }
  return value
    .split(',')
    .map(kind => kind.trim())
    .filter(kind => kind !== '')
    .map((kind) => {
      const match = allKinds.find(known => known.toLowerCase() === kind.toLowerCase());
      assert(match, `SNAPSHOT_KINDS contains unknown kind '${kind}'`);
      return match;
    });
}

export default class OperatorConfig {
  constructor (
    public readonly port: number,
    public readonly apiUrl: string,
    public readonly tokenPath: string | undefined,
    public readonly caPath: string | undefined,
    public readonly snapshotKinds: ClusterObjectKind[],
    public readonly snapshotRefreshIntervalMs: number,
    public readonly component: MetricsComponent,
  ) {}

  static fromEnv (env: NodeJS.ProcessEnv = process.env): OperatorConfig {
    const inCluster = env.KUBERNETES_SERVICE_HOST !== undefined;
    const apiUrl = env.KUBERNETES_API_URL ??
      (inCluster ? `https://${env.KUBERNETES_SERVICE_HOST}:${env.KUBERNETES_SERVICE_PORT ?? '443'}` : undefined);
    assert(apiUrl, 'KUBERNETES_API_URL is not defined');

    return new OperatorConfig(
      parsePositiveInteger(env.PORT, DEFAULT_PORT, 'PORT'),
      apiUrl.replace(/\/+$/, ''),
      env.KUBERNETES_TOKEN_PATH ?? (inCluster ? SERVICE_ACCOUNT_TOKEN_PATH : undefined),
      env.KUBERNETES_CA_PATH ?? (inCluster ? SERVICE_ACCOUNT_CA_PATH : undefined),
      parseSnapshotKinds(env.SNAPSHOT_KINDS, parseBoolean(env.SNAPSHOT_METRICS_ENABLED, true, 'SNAPSHOT_METRICS_ENABLED')),
      parsePositiveInteger(env.SNAPSHOT_REFRESH_INTERVAL_MS, DEFAULT_SNAPSHOT_REFRESH_INTERVAL_MS, 'SNAPSHOT_REFRESH_INTERVAL_MS'),
      parseMetricsComponent(env.METRICS_COMPONENT),
    );
  }
}
