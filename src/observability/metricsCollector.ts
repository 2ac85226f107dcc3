// src/observability/metricsCollector.ts
// Feeds kanban_http_requests_total and the duration histogram from
// Fastify's onResponse hook.

import type { FastifyInstance } from "fastify";
import { recordHttpRequest, METRICS_ENABLED } from "./metrics";
import { createLogger } from "./logger";

const log = createLogger("metrics");

// Scrapes and probes would drown out API traffic
const UNTRACKED_ROUTES: ReadonlySet<string> = new Set([
  "/metrics",
  "/health",
  "/health/live",
  "/health/ready",
]);

/**
 * Label for a request's route pattern. Requests the router did not match
 * share one label so random 404 paths cannot grow the series count; null
 * means the request is not recorded.
 */
export function routeLabel(routeUrl: string | undefined): string | null {
  if (!routeUrl) return "unmatched";
  return UNTRACKED_ROUTES.has(routeUrl) ? null : routeUrl;
}

export function registerMetricsCollector(app: FastifyInstance): void {
  if (!METRICS_ENABLED) {
    log.debug("HTTP metrics disabled");
    return;
  }

  app.addHook("onResponse", async (req, reply) => {
    const route = routeLabel(req.routeOptions.url);
    if (route === null) return;
    recordHttpRequest(req.method, route, reply.statusCode, reply.elapsedTime);
  });
}
