// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type Backend = "local" | "remote";

/* ── Configuration ─────────────────────────────────────── */

export interface BackendSettings {
  readonly backend: Backend;
  readonly apiKeyConfigured: boolean;
  readonly baseUrl?: string;
  readonly timeoutSeconds: number;
  readonly maxRetries: number;
}

export interface ModelDescriptor {
  readonly name: string;
  readonly backend: Backend;
  readonly contextWindow: number;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly topP: number;
}

export interface DashboardConfiguration {
  readonly activeBackend: Backend;
  readonly activeModel: string;
  readonly backends: Readonly<Partial<Record<Backend, BackendSettings>>>;
  readonly models: Readonly<Record<string, ModelDescriptor>>;
}

/* ── Health ────────────────────────────────────────────── */

export interface BackendStatus {
  readonly backend: Backend;
  readonly available: boolean;
  readonly healthy: boolean;
  readonly responseTimeMs?: number;
  readonly errorMessage?: string;
  readonly lastCheckedAt: string;
}

export interface HealthSummary {
  readonly perBackendStatus: readonly BackendStatus[];
  readonly localLoadedCount: number;
  readonly localAvailableCount: number;
  readonly remoteConnected: boolean;
  readonly activeBackend: Backend;
  readonly activeModel: string;
  readonly systemHealthy: boolean;
}

/* ── Local runtime ─────────────────────────────────────── */

export interface LocalModelInfo {
  readonly name: string;
  readonly sizeGb: number;
  readonly loaded: boolean;
  readonly contextWindow: number;
  readonly maxTokens: number;
  readonly lastUsedAt?: string;
}

export interface LocalInventory {
  readonly models: readonly LocalModelInfo[];
  readonly loadedNames: ReadonlySet<string>;
}

/* ── Remote API ────────────────────────────────────────── */

export interface RemoteStatus {
  readonly connected: boolean;
  readonly creditsRemaining?: number;
  readonly rateLimitRemaining?: number;
  readonly errorMessage?: string;
}

export interface RemoteCatalog {
  readonly modelNames: readonly string[];
  readonly total: number;
}

export interface RemoteCredentials {
  readonly apiKey: string;
  readonly baseUrl?: string;
}

/* ── Performance & usage ───────────────────────────────── */

export interface PerformanceMetrics {
  readonly totalRequests: number;
  readonly successfulRequests: number;
  readonly failedRequests: number;
  readonly averageResponseTimeMs: number;
  readonly totalTokensUsed: number;
  readonly errorRate: number;
  readonly uptimePercentage: number;
}

export interface PerformanceReport {
  readonly backend: Backend;
  readonly timeRange: string;
  readonly metrics: PerformanceMetrics;
  readonly generatedAt: string;
}

export interface UsageStats {
  readonly totalRequests: number;
  readonly successfulRequests: number;
  readonly failedRequests: number;
  readonly totalTokensUsed: number;
  readonly averageResponseTimeMs: number;
  readonly requestsPerHour: number;
}

export const DEFAULT_USAGE_STATS: UsageStats = Object.freeze({
  totalRequests: 0,
  successfulRequests: 0,
  failedRequests: 0,
  totalTokensUsed: 0,
  averageResponseTimeMs: 0,
  requestsPerHour: 0,
});

export type DashboardSettings = Record<string, string | number | boolean>;
