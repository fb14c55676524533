import { inspect } from "node:util";
import { getConfig, type LOG_LEVELS } from "./config.js";

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  message: string;
  component?: string;
  requestId?: string;
  meta?: unknown;
  timestamp?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function normalizeMeta(meta: unknown): unknown {
  if (meta === undefined) {
    return undefined;
  }

  if (meta instanceof Error) {
    return { name: meta.name, message: meta.message };
  }

  try {
    JSON.stringify(meta);
    return meta;
  } catch {
    return inspect(meta, { depth: 3, breakLength: 80 });
  }
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[getConfig().logLevel];
}

/** Write one JSON line to stderr; stdout carries the MCP transport. */
export function log(entry: LogEntry): void {
  if (!isLevelEnabled(entry.level)) {
    return;
  }

  const payload: Record<string, unknown> = {
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp ?? new Date().toISOString(),
  };

  if (entry.component) {
    payload.component = entry.component;
  }

  if (entry.requestId) {
    payload.requestId = entry.requestId;
  }

  const normalizedMeta = normalizeMeta(entry.meta);
  if (normalizedMeta !== undefined) {
    payload.meta = normalizedMeta;
  }

  console.error(JSON.stringify(payload));
}

export const logger = {
  debug(message: string, component?: string, meta?: unknown): void {
    log({ level: "debug", message, component, meta });
  },
  info(message: string, component?: string, meta?: unknown): void {
    log({ level: "info", message, component, meta });
  },
  warn(message: string, component?: string, meta?: unknown): void {
    log({ level: "warn", message, component, meta });
  },
  error(message: string, component?: string, meta?: unknown): void {
    log({ level: "error", message, component, meta });
  },
};
