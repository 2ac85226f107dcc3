// src/routes/health.ts
// Health check endpoints.
// - GET /health - full status with dependency checks
// - GET /health/ready - readiness probe
// - GET /health/live - liveness probe

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { getHealthStatus, isReady, type HealthDeps } from "../observability/healthCheck";

/* ---------- Route Registration ---------- */
export function createHealthRoutes(deps: HealthDeps) {
  return async function healthRoutes(app: FastifyInstance) {
    app.get("/health", async (_req: FastifyRequest, reply: FastifyReply) => {
      const health = await getHealthStatus(deps);
      return reply.code(health.status === "healthy" ? 200 : 503).send(health);
    });

    app.get("/health/ready", async (_req: FastifyRequest, reply: FastifyReply) => {
      const ready = await isReady(deps);
      return reply.code(ready ? 200 : 503).send({ ready });
    });

    // Process is up if it can answer at all
    app.get("/health/live", async () => ({ alive: true }));
  };
}
