// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { LogLevel } from "./logger.js";

export interface DashboardConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  performanceTimeRange: string;
  seedPath?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? "info").toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DashboardConfig {
  const port = Number(env.DASHBOARD_PORT ?? "4310");
  return {
    port: Number.isInteger(port) && port > 0 ? port : 4310,
    host: env.DASHBOARD_HOST ?? "127.0.0.1",
    logLevel: parseLogLevel(env.DASHBOARD_LOG_LEVEL),
    performanceTimeRange: env.DASHBOARD_PERFORMANCE_RANGE ?? "24h",
    seedPath: env.DASHBOARD_SEED_PATH || undefined,
  };
}
