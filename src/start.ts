import { readFileSync } from 'fs';
import { register } from 'prom-client';

import ClusterClient from './cluster-client';
import setUpTracerExport from './instrumentation';
import logger from './logger';
import { startServer } from './metrics';
import MetricsSync from './metrics-sync';
import OperatorConfig from './operator-config';

function readOptionalFile (path: string | undefined): string | undefined {
  return path === undefined ? undefined : readFileSync(path, 'utf8').trim();
}

async function main (): Promise<void> {
  setUpTracerExport();

  const config = OperatorConfig.fromEnv();
  const clusterClient = new ClusterClient({
    apiUrl: config.apiUrl,
    token: readOptionalFile(config.tokenPath),
    caCert: readOptionalFile(config.caPath),
  });
  const metricsSync = MetricsSync.create(clusterClient, {
    registry: register,
    snapshotKinds: config.snapshotKinds,
    component: config.component,
  });
  logger.info(`Registered ${config.component} metrics`);

  const server = startServer(config.port, register);

  const refresh = (): void => {
    metricsSync.refreshSnapshots().catch((error) => {
      logger.error('Failed to refresh snapshot metrics', error);
    });
  };
  refresh();
  const refreshInterval = setInterval(refresh, config.snapshotRefreshIntervalMs);

  process.on('SIGTERM', () => {
    logger.info('Shutting down metrics server');
    clearInterval(refreshInterval);
    server.close();
  });
}

main().catch((error) => {
  logger.error('Failed to start metrics sync', error);
  process.exit(1);
});
