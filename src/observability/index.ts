// src/observability/index.ts
// Observability exports and combined Fastify registration.

import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId";
import { registerRequestLogger } from "./requestLogger";
import { registerMetricsCollector } from "./metricsCollector";

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  type LogLevel,
} from "./logger";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  getOrCreateRequestIdFromMessage,
  requestIdGenerator,
  REQUEST_ID_HEADER,
} from "./requestId";

/* ---------- Metrics ---------- */
export {
  registry,
  recordBoardEvent,
  setWebsocketConnections,
  METRICS_ENABLED,
  type BroadcastOutcome,
} from "./metrics";

/* ---------- Health Checks ---------- */
export {
  getHealthStatus,
  isReady,
  type HealthDeps,
  type HealthStatus,
  type HealthCheckResult,
} from "./healthCheck";

/** Request id, request logging and HTTP metrics hooks. */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
  registerMetricsCollector(app);
}
