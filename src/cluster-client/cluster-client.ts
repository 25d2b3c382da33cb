import https from 'https';
import fetch, { type Response } from 'node-fetch';

import { ClusterObjectKind, type ClusterObject } from '../cluster-objects';
import { wrapError } from '../utility';

interface Dependencies {
  fetch: typeof fetch
}

export interface ClusterClientConfig {
  apiUrl: string
  token?: string
  caCert?: string
  pageSize?: number
}

export interface ObjectLister {
  list: (kind: ClusterObjectKind) => Promise<ClusterObject[]>
}

interface ObjectList {
  items?: ClusterObject[]
  metadata?: {
    continue?: string
  }
}

export const LISTING_ERROR = 'ListingError';
export const OPERATORS_API_PATH = '/apis/operators.coreos.com/v1alpha1';

const RESOURCE_PLURALS: Record<ClusterObjectKind, string> = {
  [ClusterObjectKind.CLUSTER_SERVICE_VERSION]: 'clusterserviceversions',
  [ClusterObjectKind.INSTALL_PLAN]: 'installplans',
  [ClusterObjectKind.SUBSCRIPTION]: 'subscriptions',
  [ClusterObjectKind.CATALOG_SOURCE]: 'catalogsources',
};

export default class ClusterClient implements ObjectLister {
  static DEFAULT_PAGE_SIZE = 500;

  private readonly deps: Dependencies;
  private readonly agent: https.Agent | undefined;

  constructor (private readonly config: ClusterClientConfig, deps?: Partial<Dependencies>) {
    this.deps = {
      fetch,
      ...deps,
    };
    this.agent = config.caCert !== undefined ? new https.Agent({ ca: config.caCert }) : undefined;
  }

  resourceUrl (kind: ClusterObjectKind, continueToken?: string): string {
    const params = new URLSearchParams({ limit: String(this.config.pageSize ?? ClusterClient.DEFAULT_PAGE_SIZE) });
    if (continueToken) {
      params.set('continue', continueToken);
    }
    return `${this.config.apiUrl}${OPERATORS_API_PATH}/${RESOURCE_PLURALS[kind]}?${params.toString()}`;
  }

  // Lists across all namespaces, following continue tokens until the last page
  async list (kind: ClusterObjectKind): Promise<ClusterObject[]> {
    return await wrapError(async () => {
      const items: ClusterObject[] = [];
      let continueToken: string | undefined;
      do {
        const page = await this.fetchPage(kind, continueToken);
        items.push(...(page.items ?? []));
        continueToken = page.metadata?.continue;
      } while (continueToken);
      return items;
    }, `Failed to list ${RESOURCE_PLURALS[kind]}`, LISTING_ERROR);
  }

  private async fetchPage (kind: ClusterObjectKind, continueToken?: string): Promise<ObjectList> {
    const response: Response = await this.deps.fetch(
      this.resourceUrl(kind, continueToken),
      {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          ...(this.config.token !== undefined ? { Authorization: `Bearer ${this.config.token}` } : {}),
        },
        agent: this.agent,
      }
    );

    const body: string = await response.text();

    if (response.status !== 200) {
      throw new Error(body);
    }

    const page: ObjectList = JSON.parse(body);
    return page;
  }
}
