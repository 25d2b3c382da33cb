import winston from 'winston';
import { LoggingWinston } from '@google-cloud/logging-winston';
import Transport from 'winston-transport';

import { METRICS } from './metrics';

const { format, transports } = winston;

export const SERVICE_NAME = 'olm-metrics-sync';
const DEFAULT_LOG_LEVEL = 'info';

// Every line logged at or above the logger level lands in olm_metrics_logs_count
class LogCounter extends Transport {
  log (info: { level: string }, callback: () => void): void {
    METRICS.LOGS_COUNT.labels({ level: info.level }).inc();

    callback();
  }
}

function logLevel (level: string | undefined): string {
  return level !== undefined && level in winston.config.npm.levels ? level : DEFAULT_LOG_LEVEL;
}

const logger = winston.createLogger({
  level: logLevel(process.env.LOG_LEVEL),
  defaultMeta: { service: SERVICE_NAME },
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
  ),
  transports: [new LogCounter()],
});

if (process.env.GCP_LOGGING_ENABLED) {
  logger.add(new LoggingWinston({ redirectToStdout: true, serviceContext: { service: SERVICE_NAME } }));
} else {
  logger.add(new transports.Console({
    format: format.combine(
      format.colorize(),
      format.simple(),
    ),
    silent: process.env.NODE_ENV === 'test'
  }));
}

export default logger;
