// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

const envLevel = process.env.LOG_LEVEL ?? "";
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

function emit(level: LogLevel, scope: string | undefined, message: string, meta: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const line = JSON.stringify({ level, scope, message, meta, ts: Date.now() });
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export function createLogger(scope?: string): Logger {
  return {
    debug(message: string, meta?: unknown): void {
      emit("debug", scope, message, meta);
    },
    info(message: string, meta?: unknown): void {
      emit("info", scope, message, meta);
    },
    warn(message: string, meta?: unknown): void {
      emit("warn", scope, message, meta);
    },
    error(message: string, meta?: unknown): void {
      emit("error", scope, message, meta);
    }
  };
}

export const log = createLogger();
