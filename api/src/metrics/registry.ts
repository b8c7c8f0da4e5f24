// SPDX-License-Identifier: Apache-2.0
// api/src/metrics/registry.ts
import client from "prom-client";

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

export const httpDuration = new client.Histogram({
  name: "http_request_duration_seconds",
  help: "Request duration histogram",
  labelNames: ["method", "code"],
  buckets: [0.01, 0.05, 0.1, 0.3, 0.6, 1, 2, 5],
  registers: [registry],
});

export const httpRequestsTotal = new client.Counter({
  name: "webhook_relay_http_requests_total",
  help: "Total HTTP requests",
  labelNames: ["route", "method", "code"],
  registers: [registry],
});

// outcome: published | challenge | rejected | method | config | timeout | upstream | failed
export const webhookOutcomes = new client.Counter({
  name: "webhook_requests_total",
  help: "Webhook calls by handling outcome",
  labelNames: ["outcome"],
  registers: [registry],
});

export const publishDuration = new client.Histogram({
  name: "webhook_publish_duration_seconds",
  help: "Broker publish round-trip, including timeouts",
  labelNames: ["result"],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});
