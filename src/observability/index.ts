export { logger, createServiceLogger } from './logger';

export {
  LogContext,
  addLogContext,
  getCorrelationId,
  logContextFields,
  runWithLogContext,
} from './log-context';

export { correlationMiddleware } from './correlation';

export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  transfersTotal,
  transferAmount,
  transferDuration,
  entriesAppendedTotal,
  lockTimeoutsTotal,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

export { metricsMiddleware } from './metrics.middleware';
