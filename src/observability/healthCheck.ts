// src/observability/healthCheck.ts
// Dependency health checks backing /health, /health/ready and /health/live.

import type { DbAdapter } from "../db/types";
import { createLogger } from "./logger";

const log = createLogger("health");

/* ---------- Types ---------- */

export interface HealthCheckResult {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthStatus {
  status: "healthy" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    database: HealthCheckResult;
    realtime: HealthCheckResult & { connections?: number };
  };
}

export interface HealthDeps {
  db: DbAdapter;
  /** Registered WebSocket connection count. */
  connectionCount: () => number;
}

/* ---------- Configuration ---------- */

const HEALTH_CHECK_TIMEOUT = Number(process.env.HEALTH_CHECK_TIMEOUT) || 5000;
const SERVICE_VERSION = process.env.npm_package_version || "unknown";
const startTime = Date.now();

/* ---------- Individual Checks ---------- */

async function checkDatabase(db: DbAdapter): Promise<HealthCheckResult> {
  const start = Date.now();

  try {
    const row = await db.queryOne<{ ok: number | string }>("SELECT 1 AS ok");
    if (row && Number(row.ok) === 1) {
      return { status: "up", latency: Date.now() - start };
    }
    return {
      status: "down",
      latency: Date.now() - start,
      error: "Unexpected query result",
    };
  } catch (err) {
    log.error({ err }, "Database health check failed");
    return {
      status: "down",
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

/* ---------- Timeout Wrapper ---------- */

async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  fallback: T
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<T>((resolve) => {
    timeoutId = setTimeout(() => resolve(fallback), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/* ---------- Combined Health Check ---------- */

export async function getHealthStatus(deps: HealthDeps): Promise<HealthStatus> {
  const database = await withTimeout(
    checkDatabase(deps.db),
    HEALTH_CHECK_TIMEOUT,
    { status: "down", error: "Timeout" }
  );

  return {
    status: database.status === "up" ? "healthy" : "unhealthy",
    timestamp: new Date().toISOString(),
    version: SERVICE_VERSION,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: {
      database,
      realtime: { status: "up", connections: deps.connectionCount() },
    },
  };
}

/** Readiness: every dependency reachable. */
export async function isReady(deps: HealthDeps): Promise<boolean> {
  const health = await getHealthStatus(deps);
  return health.status === "healthy";
}
