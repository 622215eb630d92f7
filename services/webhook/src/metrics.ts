import client, { type Counter, type Registry } from 'prom-client';

export type AlertOutcome =
  | 'invalid_json'
  | 'bad_token'
  | 'invalid_alert'
  | 'skipped'
  | 'not_configured'
  | 'deal_started'
  | 'error';

export interface Metrics {
  registry: Registry;
  alerts: Counter<'outcome'>;
  requests: Counter<'method' | 'path' | 'status'>;
}

export function createMetrics(): Metrics {
  const registry = new client.Registry();
  client.collectDefaultMetrics({ register: registry });
  const alerts = new client.Counter({ name: 'webhook_alerts_total', help: 'Alerts handled, by outcome', labelNames: ['outcome'] as const, registers: [registry] });
  const requests = new client.Counter({ name: 'webhook_http_requests_total', help: 'Total HTTP requests', labelNames: ['method', 'path', 'status'] as const, registers: [registry] });
  return { registry, alerts, requests };
}
