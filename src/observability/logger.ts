// src/observability/logger.ts
// One pino root for the process; modules log through named children so
// every line carries `module`. Credentials never reach the output.

import pino, { type Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
]);

// Tokens arrive in headers, bodies and the WebSocket query string
const REDACTED_PATHS = [
  "req.headers.authorization",
  "headers.authorization",
  "password",
  "token",
  "accessToken",
  "refreshToken",
];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.has(value);
}

/** LOG_LEVEL, falling back to info for anything pino would not accept. */
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase() ?? "";
  return isLogLevel(level) ? level : "info";
}

function buildRoot(): Logger {
  const options: pino.LoggerOptions = {
    level: getLogLevel(),
    base: { service: "kanban-backend", pid: process.pid },
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (process.env.LOG_PRETTY !== "true") return pino(options);

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:HH:MM:ss.l", ignore: "pid,service" },
    },
  });
}

let root: Logger | null = null;

/**
 * @example
 * const log = createLogger('realtime/connections');
 * log.info({ userId, boardId }, 'subscribed to board');
 */
export function createLogger(moduleName?: string): Logger {
  if (!root) root = buildRoot();
  return moduleName ? root.child({ module: moduleName }) : root;
}

export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

export const logger = createLogger();
