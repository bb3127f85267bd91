// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export const log = {
  debug(message: string, meta?: unknown): void {
    if (!enabled("debug")) return;
    console.log(JSON.stringify({ level: "debug", message, meta, ts: Date.now() }));
  },
  info(message: string, meta?: unknown): void {
    if (!enabled("info")) return;
    console.log(JSON.stringify({ level: "info", message, meta, ts: Date.now() }));
  },
  warn(message: string, meta?: unknown): void {
    if (!enabled("warn")) return;
    console.warn(JSON.stringify({ level: "warn", message, meta, ts: Date.now() }));
  },
  error(message: string, meta?: unknown): void {
    console.error(JSON.stringify({ level: "error", message, meta, ts: Date.now() }));
  }
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
