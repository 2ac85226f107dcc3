// src/observability/requestLogger.ts
// Request/response logging with timing and user/board context.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { createLogger, createChildLogger } from "./logger";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  userId?: number;
  boardId?: string;
  [key: string]: unknown;
}

/* ---------- Context Extraction ---------- */

function extractBoardId(req: FastifyRequest): string | undefined {
  const params = req.params;
  if (params && typeof params === "object" && "boardId" in params) {
    const value = params.boardId;
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
}

function buildRequestContext(req: FastifyRequest): RequestContext {
  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    userId: req.user?.id,
    boardId: extractBoardId(req),
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");

export function createRequestLogger(req: FastifyRequest): Logger {
  return createChildLogger(baseLogger, buildRequestContext(req));
}

/* ---------- Fastify Hook Registration ---------- */

const requestStartTimes = new WeakMap<FastifyRequest, number>();

/**
 * Logs request completion (level by status code) and handler errors.
 * The user is only known after the auth preHandler, so context is rebuilt
 * at response time.
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
    createRequestLogger(req).debug("request started");
  });

  app.addHook(
    "onResponse",
    async (req: FastifyRequest, reply: FastifyReply) => {
      const startTime = requestStartTimes.get(req);
      const duration = startTime ? Date.now() - startTime : 0;

      const log = createChildLogger(baseLogger, {
        ...buildRequestContext(req),
        statusCode: reply.statusCode,
        duration,
      });

      if (reply.statusCode >= 500) {
        log.error("request failed");
      } else if (reply.statusCode >= 400) {
        log.warn("request error");
      } else {
        log.info("request completed");
      }

      requestStartTimes.delete(req);
    }
  );

  app.addHook("onError", async (req: FastifyRequest, _reply, error) => {
    createRequestLogger(req).error(
      {
        err: {
          message: error.message,
          name: error.name,
          stack: error.stack,
        },
      },
      "request error"
    );
  });
}
