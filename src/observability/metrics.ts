// src/observability/metrics.ts
// Prometheus metrics (prom-client), exposed at GET /metrics.

import {
  Registry,
  Counter,
  Histogram,
  Gauge,
  collectDefaultMetrics,
} from "prom-client";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "kanban";
const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "kanban-backend",
});

if (METRICS_ENABLED) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- HTTP Metrics ---------- */

export const httpRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_http_requests_total`,
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_http_request_duration_seconds`,
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

/* ---------- Realtime Metrics ---------- */

export const activeWebsocketConnections = new Gauge({
  name: `${METRICS_PREFIX}_active_websocket_connections`,
  help: "Number of registered WebSocket connections",
  registers: [registry],
});

/**
 * Board broadcasts by outcome:
 * delivered (at least one send attempted), no_subscribers, rejected (failed validation).
 */
export const boardEventsTotal = new Counter({
  name: `${METRICS_PREFIX}_board_events_total`,
  help: "Board events passed to the broadcaster",
  labelNames: ["event", "outcome"] as const,
  registers: [registry],
});

export type BroadcastOutcome = "delivered" | "no_subscribers" | "rejected";

/* ---------- Helper Functions ---------- */

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  httpRequestsTotal.inc({
    method,
    route: normalizeRoute(route),
    status_code: statusCode.toString(),
  });

  httpRequestDuration.observe(
    { method, route: normalizeRoute(route) },
    durationMs / 1000
  );
}

export function setWebsocketConnections(count: number): void {
  if (!METRICS_ENABLED) return;
  activeWebsocketConnections.set(count);
}

export function recordBoardEvent(event: string, outcome: BroadcastOutcome): void {
  if (!METRICS_ENABLED) return;
  boardEventsTotal.inc({ event, outcome });
}

/* ---------- Route Normalization ---------- */

/** Collapse numeric ids so route labels stay low-cardinality. */
export function normalizeRoute(route: string): string {
  const path = route.split("?")[0];
  return path.replace(/\/\d+(?=\/|$)/g, "/:id");
}

/* ---------- Exports ---------- */
export { METRICS_ENABLED };
