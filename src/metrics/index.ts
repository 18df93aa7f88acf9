import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const commandsTotal = new Counter({
  name: 'gateway_commands_total',
  help: 'Commands dispatched, by operation and outcome',
  labelNames: ['operation', 'outcome'] as const, // outcome=success|<error code>
  registers: [registry],
});

export const commandLatencySeconds = new Histogram({
  name: 'gateway_command_latency_seconds',
  help: 'Latency of a dispatched command (seconds)',
  labelNames: ['operation'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1],
  registers: [registry],
});

export const bulkItemsTotal = new Counter({
  name: 'gateway_bulk_items_total',
  help: 'Bulk items processed, by sub-operation and result',
  labelNames: ['operation', 'result'] as const, // result=success|failure
  registers: [registry],
});

export const permissionDenialsTotal = new Counter({
  name: 'gateway_permission_denials_total',
  help: 'Commands refused by the permission gate',
  labelNames: ['action'] as const,
  registers: [registry],
});

export const authFailuresTotal = new Counter({
  name: 'gateway_auth_failures_total',
  help: 'Bearer credential verifications that failed',
  registers: [registry],
});

export const credentialRegenerationsTotal = new Counter({
  name: 'gateway_credential_regenerations_total',
  help: 'Credential secrets regenerated',
  registers: [registry],
});

export function metricsSummary() {
  return registry.metrics();
}
