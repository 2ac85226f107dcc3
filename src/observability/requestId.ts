// src/observability/requestId.ts
// Request correlation ids: honour an upstream X-Request-ID, otherwise mint one.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { IncomingMessage } from "http";
import { nanoid } from "nanoid";

/* ---------- Constants ---------- */
export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21;
const MAX_INCOMING_ID_LENGTH = 128;

export function generateRequestId(): string {
  return nanoid(REQUEST_ID_LENGTH);
}

/**
 * Pick the inbound id when it is a sane header value, else generate.
 * Also used for WebSocket upgrades, which never reach Fastify's genReqId.
 */
export function getOrCreateRequestIdFromMessage(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];

  if (
    typeof incomingId === "string" &&
    incomingId.length > 0 &&
    incomingId.length <= MAX_INCOMING_ID_LENGTH
  ) {
    return incomingId;
  }

  return generateRequestId();
}

/* ---------- Fastify Wiring ---------- */

/** Echo the request id back on every response. */
export function registerRequestIdHook(app: FastifyInstance): void {
  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}

/** Use in Fastify({ genReqId: requestIdGenerator }). */
export function requestIdGenerator(req: IncomingMessage): string {
  return getOrCreateRequestIdFromMessage(req);
}
