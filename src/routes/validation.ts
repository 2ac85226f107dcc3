// src/routes/validation.ts
// Request body and path parameter readers. Fastify runs without JSON
// schemas here, so every handler narrows its input through these.

import type { FastifyReply } from 'fastify';

/** Positive integer path param, or null. */
export function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/** Integer from a JSON body value (numbers or numeric strings). */
export function readInt(value: unknown): number | null {
  if (typeof value === 'number' && Number.isSafeInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    const n = Number(value.trim());
    return Number.isSafeInteger(n) ? n : null;
  }
  return null;
}

export function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** Trimmed, non-empty string or undefined. */
export function readText(value: unknown): string | undefined {
  const s = readString(value)?.trim();
  return s ? s : undefined;
}

export function readIntList(value: unknown): number[] | null {
  if (!Array.isArray(value)) return null;
  const ids: number[] = [];
  for (const item of value) {
    const id = readInt(item);
    if (id === null) return null;
    ids.push(id);
  }
  return ids;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Body as a plain object; anything else reads as empty. */
export function bodyOf(body: unknown): Record<string, unknown> {
  return isRecord(body) ? body : {};
}

/* ---------- Error replies ---------- */

export function badRequest(reply: FastifyReply, message: string) {
  return reply.code(400).send({ error: 'validation', message });
}

export function notFound(reply: FastifyReply, message: string) {
  return reply.code(404).send({ error: 'not_found', message });
}

export function forbidden(reply: FastifyReply, message: string) {
  return reply.code(403).send({ error: 'forbidden', message });
}

export function conflict(reply: FastifyReply, message: string) {
  return reply.code(409).send({ error: 'conflict', message });
}

/* ---------- Dates ---------- */

export type Parsed<T> = { ok: true; value: T } | { ok: false };

/** Nullable ISO-8601 timestamp as unix ms. */
export function readTimestamp(value: unknown): Parsed<number | null> {
  if (value === null || value === '') return { ok: true, value: null };
  if (typeof value !== 'string') return { ok: false };
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? { ok: false } : { ok: true, value: ms };
}
