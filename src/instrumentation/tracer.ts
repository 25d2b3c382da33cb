import { NodeSDK, resources, tracing } from '@opentelemetry/sdk-node';
import { ZipkinExporter } from '@opentelemetry/exporter-zipkin';
import { SEMRESATTRS_SERVICE_NAME, SEMRESATTRS_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';

import logger from '../logger';

const SERVICE_NAME = 'olm-metrics-sync';

export default function setUpTracerExport (): void {
  switch (process.env.TRACING_EXPORTER) {
    case 'CONSOLE':
      setConsoleExport();
      break;
    case 'ZIPKIN':
      setZipkinExport();
      break;
    default: // No-Op
      logger.debug('Using No Op Exporter. No traces will be recorded.');
      break;
  }
}

function sampleRate (): number {
  return Math.min(parseFloat(process.env.TRACING_SAMPLE_RATE ?? '0.1'), 1.0);
}

function serviceResource (): resources.Resource {
  return new resources.Resource({
    [SEMRESATTRS_SERVICE_NAME]: SERVICE_NAME,
    [SEMRESATTRS_SERVICE_VERSION]: '1.0',
  });
}

function setZipkinExport (): void {
  logger.debug('Using Zipkin Exporter. Traces exported to Zipkin in port 9411.');
  const sdk = new NodeSDK({
    resource: serviceResource(),
    traceExporter: new ZipkinExporter(),
    sampler: new tracing.TraceIdRatioBasedSampler(sampleRate()),
  });

  sdk.start();
}

function setConsoleExport (): void {
  logger.debug('Using Console Exporter. Traces exported to console.');
  const sdk = new NodeSDK({
    resource: serviceResource(),
    traceExporter: new tracing.ConsoleSpanExporter(),
    sampler: new tracing.TraceIdRatioBasedSampler(sampleRate()),
  });

  sdk.start();
}
