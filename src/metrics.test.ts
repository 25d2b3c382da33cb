import { once } from 'events';
import { type Server } from 'http';
import fetch from 'node-fetch';
import { Registry } from 'prom-client';
import VError from 'verror';

import { createCatalogMetrics, createOlmMetrics, startServer } from './metrics';

describe('metrics', () => {
  it('registers the olm and catalog groups side by side', async () => {
    const registry = new Registry();

    createOlmMetrics(registry);
    createCatalogMetrics(registry);

    const names = (await registry.getMetricsAsJSON()).map(metric => metric.name).sort();
    expect(names).toEqual([
      'catalog_source_count',
      'csv_abnormal',
      'csv_count',
      'csv_succeeded',
      'csv_upgrade_count',
      'install_plan_count',
      'subscription_count',
      'subscription_sync_total',
    ]);
  });

  it('refuses to register a group twice', () => {
    const registry = new Registry();
    createOlmMetrics(registry);

    expect(() => createOlmMetrics(registry)).toThrow(VError);
    expect(() => createOlmMetrics(registry)).toThrow('Failed to register olm metrics');
  });

  it('refuses a catalog group over an existing one', () => {
    const registry = new Registry();
    createCatalogMetrics(registry);

    expect(() => createCatalogMetrics(registry)).toThrow('Failed to register catalog metrics');
  });

  it('exposes labelled series in the text format', async () => {
    const registry = new Registry();
    const { SUBSCRIPTION_SYNC_COUNT } = createCatalogMetrics(registry);

    SUBSCRIPTION_SYNC_COUNT.labels({ name: 'etcd-sub', installed: '', channel: 'stable', package: 'etcd' }).inc(3);

    const lines = (await registry.metrics()).split('\n');
    expect(lines).toContain('subscription_sync_total{name="etcd-sub",installed="",channel="stable",package="etcd"} 3');
  });

  it('serves the registry over http', async () => {
    const registry = new Registry();
    const { SUBSCRIPTION_SYNC_COUNT } = createCatalogMetrics(registry);
    SUBSCRIPTION_SYNC_COUNT.labels({ name: 'etcd-sub', installed: 'etcdoperator.v0.9.4', channel: 'stable', package: 'etcd' }).inc();

    const server = startServer(0, registry);
    try {
      await once(server, 'listening');
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('metrics server is not listening on a port');
      }

      const response = await fetch(`http://127.0.0.1:${address.port}/metrics`);

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/plain; charset=utf-8; version=0.0.4');
      expect((await response.text()).split('\n'))
        .toContain('subscription_sync_total{name="etcd-sub",installed="etcdoperator.v0.9.4",channel="stable",package="etcd"} 1');
    } finally {
      await closeServer(server);
    }
  });
});

async function closeServer (server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error !== undefined) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
