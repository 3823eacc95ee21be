/**
 * Observability layer exports for logging and metrics
 */

import { ConsoleLogger, NoopLogger, type Logger, type LoggingConfig } from './logging.js';
import { NoopMetricsCollector, type MetricsCollector } from './metrics.js';

export {
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
  type Logger,
  createDefaultLoggingConfig,
  parseLogLevel,
  ConsoleLogger,
  NoopLogger,
  logElapsed,
  logError,
} from './logging.js';

export {
  type MetricsCollector,
  InMemoryMetricsCollector,
  NoopMetricsCollector,
  MetricNames,
} from './metrics.js';

/**
 * Logger and metrics handed to every service.
 */
export interface Observability {
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
}

export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
  };
}

export function createConsoleObservability(config?: Partial<LoggingConfig>): Observability {
  return {
    logger: new ConsoleLogger(config),
    metrics: new NoopMetricsCollector(),
  };
}
