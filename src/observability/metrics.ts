import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'credit-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Transfer and issuance outcomes
 * outcome: committed, replayed, rejected, aborted
 */
export const transfersTotal = new Counter({
  name: 'ledger_transfers_total',
  help: 'Credit movements by kind and outcome',
  labelNames: ['kind', 'outcome'] as const,
  registers: [registry],
});

export const transferAmount = new Histogram({
  name: 'ledger_transfer_amount_credits',
  help: 'Committed credit movement amounts',
  labelNames: ['kind'] as const,
  buckets: [10, 50, 100, 500, 1000, 5000, 10000, 50000, 100000],
  registers: [registry],
});

export const transferDuration = new Histogram({
  name: 'ledger_transfer_duration_seconds',
  help: 'Time spent inside the transfer unit, lock wait included',
  labelNames: ['kind', 'outcome'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [registry],
});

export const entriesAppendedTotal = new Counter({
  name: 'ledger_entries_appended_total',
  help: 'Ledger entries committed to the entry log',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export const lockTimeoutsTotal = new Counter({
  name: 'ledger_lock_timeouts_total',
  help: 'Transfer units abandoned because a lock wait timed out',
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

/**
 * Get all metrics as Prometheus text format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

/**
 * Get content type for metrics response
 */
export const getMetricsContentType = (): string => {
  return registry.contentType;
};
