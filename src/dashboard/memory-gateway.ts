// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import {
  DEFAULT_USAGE_STATS,
  type Backend,
  type BackendSettings,
  type BackendStatus,
  type DashboardConfiguration,
  type DashboardSettings,
  type HealthSummary,
  type LocalInventory,
  type LocalModelInfo,
  type ModelDescriptor,
  type PerformanceReport,
  type RemoteCatalog,
  type RemoteCredentials,
  type RemoteStatus,
  type UsageStats,
} from "../common/types.js";
import type { DashboardGateway } from "./gateway.js";
import { summarizeHealth } from "./health.js";
import type { DashboardSeed } from "./seed.js";

const DEFAULT_TIMEOUT_SECONDS = 30;
const DEFAULT_MAX_RETRIES = 3;

export interface InMemoryGatewayOptions {
  timeRange?: string;
  now?: () => Date;
}

/**
 * Gateway backed by process memory. Mirrors the validation rules of the
 * rating backend's model routes so the dashboard can run without one.
 */
export class InMemoryGateway implements DashboardGateway {
  private activeBackend: Backend;
  private activeModel: string;
  private readonly models = new Map<string, ModelDescriptor>();
  private readonly localModels = new Map<string, LocalModelInfo>();
  private readonly remoteModels: string[];
  private remote: DashboardSeed["remote"];
  private readonly performance: DashboardSeed["performance"];
  private settings: DashboardSettings;
  private readonly usage: UsageStats;
  private readonly timeRange: string;
  private readonly now: () => Date;

  constructor(seed: DashboardSeed, options: InMemoryGatewayOptions = {}) {
    this.activeBackend = seed.activeBackend;
    this.activeModel = seed.activeModel;
    for (const model of seed.models) this.models.set(model.name, { ...model });
    for (const model of seed.localModels) this.localModels.set(model.name, { ...model });
    this.remoteModels = [...seed.remoteModels];
    this.remote = { ...seed.remote };
    this.performance = seed.performance.map((p) => ({ backend: p.backend, metrics: { ...p.metrics } }));
    this.settings = { ...seed.settings };
    this.usage = { ...(seed.usage ?? DEFAULT_USAGE_STATS) };
    this.timeRange = options.timeRange ?? "24h";
    this.now = options.now ?? (() => new Date());
  }

  async getConfiguration(): Promise<DashboardConfiguration> {
    return this.configuration();
  }

  async getBackendStatuses(): Promise<BackendStatus[]> {
    return this.statuses();
  }

  async getLocalInventory(): Promise<LocalInventory> {
    return this.inventory();
  }

  async getRemoteStatus(): Promise<RemoteStatus> {
    return this.remoteStatus();
  }

  async getRemoteCatalog(): Promise<RemoteCatalog> {
    return { modelNames: [...this.remoteModels], total: this.remoteModels.length };
  }

  async getHealthSummary(): Promise<HealthSummary> {
    return summarizeHealth(this.configuration(), this.statuses(), this.inventory(), this.remoteStatus());
  }

  async getPerformanceReports(): Promise<PerformanceReport[]> {
    const generatedAt = this.now().toISOString();
    return this.performance.map((p) => ({
      backend: p.backend,
      timeRange: this.timeRange,
      metrics: { ...p.metrics },
      generatedAt,
    }));
  }

  async switchActiveModel(backend: Backend, model: string): Promise<DashboardConfiguration> {
    if (backend === "local") {
      const local = this.localModels.get(model);
      if (!local) throw new Error("local_model_not_available");
      if (!local.loaded) throw new Error("local_model_not_loaded");
    } else {
      if (!this.remote.apiKey) throw new Error("remote_not_configured");
      if (!this.remoteModels.includes(model)) throw new Error("remote_model_not_available");
    }
    this.activeBackend = backend;
    this.activeModel = model;
    return this.configuration();
  }

  async loadLocalModel(name: string): Promise<LocalModelInfo> {
    const model = this.localModels.get(name);
    if (!model) throw new Error("local_model_not_found");
    const next = { ...model, loaded: true, lastUsedAt: this.now().toISOString() };
    this.localModels.set(name, next);
    return { ...next };
  }

  async unloadLocalModel(name: string): Promise<LocalModelInfo> {
    const model = this.localModels.get(name);
    if (!model) throw new Error("local_model_not_found");
    if (!model.loaded) throw new Error("local_model_not_loaded");
    const next = { ...model, loaded: false };
    this.localModels.set(name, next);
    return { ...next };
  }

  async setActiveBackend(backend: Backend): Promise<DashboardConfiguration> {
    const first = [...this.models.values()].find((m) => m.backend === backend);
    if (!first) throw new Error("backend_has_no_models");
    this.activeBackend = backend;
    this.activeModel = first.name;
    return this.configuration();
  }

  async setActiveModel(model: string): Promise<DashboardConfiguration> {
    const descriptor = this.models.get(model);
    if (!descriptor) throw new Error("model_not_available");
    this.activeBackend = descriptor.backend;
    this.activeModel = descriptor.name;
    return this.configuration();
  }

  async configureRemote(credentials: RemoteCredentials): Promise<RemoteStatus> {
    if (!credentials.apiKey.trim()) throw new Error("remote_api_key_required");
    this.remote = {
      ...this.remote,
      apiKey: credentials.apiKey,
      baseUrl: credentials.baseUrl ?? this.remote.baseUrl,
      connected: true,
    };
    return this.remoteStatus();
  }

  async updateSettings(settings: DashboardSettings): Promise<DashboardSettings> {
    this.settings = { ...this.settings, ...settings };
    return { ...this.settings };
  }

  async testConnection(backend: Backend): Promise<boolean> {
    return backend === "local" ? true : Boolean(this.remote.apiKey) && this.remote.connected;
  }

  async getUsageStats(_timeRange?: string): Promise<UsageStats> {
    return { ...this.usage };
  }

  private configuration(): DashboardConfiguration {
    const models: Record<string, ModelDescriptor> = {};
    for (const [name, model] of this.models) models[name] = { ...model };
    return {
      activeBackend: this.activeBackend,
      activeModel: this.activeModel,
      backends: {
        local: this.backendSettings("local"),
        remote: this.backendSettings("remote"),
      },
      models,
    };
  }

  private backendSettings(backend: Backend): BackendSettings {
    const timeout = this.settings.requestTimeout;
    const retries = this.settings.maxRetries;
    return {
      backend,
      apiKeyConfigured: backend === "remote" && Boolean(this.remote.apiKey),
      ...(backend === "remote" && this.remote.baseUrl ? { baseUrl: this.remote.baseUrl } : {}),
      timeoutSeconds: typeof timeout === "number" ? timeout : DEFAULT_TIMEOUT_SECONDS,
      maxRetries: typeof retries === "number" ? retries : DEFAULT_MAX_RETRIES,
    };
  }

  private statuses(): BackendStatus[] {
    const lastCheckedAt = this.now().toISOString();
    const configured = Boolean(this.remote.apiKey);
    const remote: BackendStatus = {
      backend: "remote",
      available: configured,
      healthy: configured && this.remote.connected,
      ...(configured ? {} : { errorMessage: "remote_not_configured" }),
      lastCheckedAt,
    };
    return [{ backend: "local", available: true, healthy: true, lastCheckedAt }, remote];
  }

  private inventory(): LocalInventory {
    const models = [...this.localModels.values()].map((m) => ({ ...m }));
    return {
      models,
      loadedNames: new Set(models.filter((m) => m.loaded).map((m) => m.name)),
    };
  }

  private remoteStatus(): RemoteStatus {
    if (!this.remote.apiKey) {
      return { connected: false, errorMessage: "remote_not_configured" };
    }
    const { connected, creditsRemaining, rateLimitRemaining } = this.remote;
    return {
      connected,
      ...(creditsRemaining !== undefined ? { creditsRemaining } : {}),
      ...(rateLimitRemaining !== undefined ? { rateLimitRemaining } : {}),
    };
  }
}
