import { type ClusterServiceVersion, isCopiedCsv, isSucceededCsv } from '../cluster-objects';
import logger from '../logger';
import {
  csvAbnormalLabels,
  csvSucceededLabels,
  sameLabels,
  type CsvAbnormalLabel,
  type CsvSucceededLabel,
  type LabelSet,
} from '../metric-labels';
import { type OlmMetrics } from '../metrics';

interface PublishedCsvSeries {
  succeeded: LabelSet<CsvSucceededLabel>
  abnormal?: LabelSet<CsvAbnormalLabel>
}

type CsvLifecycleMetrics = Pick<OlmMetrics, 'CSV_SUCCEEDED' | 'CSV_ABNORMAL' | 'CSV_UPGRADE_COUNT'>;

function objectKey (csv: ClusterServiceVersion): string {
  return `${csv.metadata.namespace ?? ''}/${csv.metadata.name}`;
}

export default class CsvMetrics {
  private readonly logger: typeof logger;
  private readonly published = new Map<string, PublishedCsvSeries>();

  constructor (
    private readonly metrics: CsvLifecycleMetrics,
  ) {
    this.logger = logger.child({ service: this.constructor.name });
  }

  emitTransition (oldCsv: ClusterServiceVersion | undefined, newCsv: ClusterServiceVersion | undefined): void {
    if (oldCsv === undefined || newCsv === undefined) {
      return;
    }

    // Copies share the original's identity and would be counted twice
    if (isCopiedCsv(newCsv)) {
      return;
    }

    this.metrics.CSV_ABNORMAL.remove(csvAbnormalLabels(oldCsv));

    const key = objectKey(newCsv);
    const previous = this.published.get(key);
    const succeeded = csvSucceededLabels(newCsv);

    if (previous !== undefined && !sameLabels(previous.succeeded, succeeded)) {
      this.metrics.CSV_SUCCEEDED.remove(previous.succeeded);
    }

    if (isSucceededCsv(newCsv)) {
      this.metrics.CSV_SUCCEEDED.labels(succeeded).set(1);
      if (previous?.abnormal !== undefined) {
        this.metrics.CSV_ABNORMAL.remove(previous.abnormal);
      }
      this.published.set(key, { succeeded });
      return;
    }

    const abnormal = csvAbnormalLabels(newCsv);
    this.metrics.CSV_SUCCEEDED.labels(succeeded).set(0);
    if (previous?.abnormal !== undefined && !sameLabels(previous.abnormal, abnormal)) {
      this.metrics.CSV_ABNORMAL.remove(previous.abnormal);
    }
    this.metrics.CSV_ABNORMAL.labels(abnormal).set(1);
    this.published.set(key, { succeeded, abnormal });

    this.logger.debug(`CSV ${key} is ${abnormal.phase} (${abnormal.reason})`);
  }

  deleteCsv (oldCsv: ClusterServiceVersion): void {
    const key = objectKey(oldCsv);
    const previous = this.published.get(key);

    this.metrics.CSV_ABNORMAL.remove(csvAbnormalLabels(oldCsv));
    this.metrics.CSV_SUCCEEDED.remove(csvSucceededLabels(oldCsv));
    if (previous !== undefined) {
      if (previous.abnormal !== undefined) {
        this.metrics.CSV_ABNORMAL.remove(previous.abnormal);
      }
      this.metrics.CSV_SUCCEEDED.remove(previous.succeeded);
    }

    this.published.delete(key);
  }

  incrementUpgradeCount (): void {
    this.metrics.CSV_UPGRADE_COUNT.inc();
  }
}
