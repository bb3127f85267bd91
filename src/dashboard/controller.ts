// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { errorMessage, log } from "../common/logger.js";
import {
  DEFAULT_USAGE_STATS,
  type Backend,
  type BackendStatus,
  type DashboardSettings,
  type RemoteCredentials,
  type UsageStats,
} from "../common/types.js";
import type { DashboardGateway } from "./gateway.js";
import { createSnapshot, withRefreshing, type DashboardReads } from "./snapshot.js";
import { describeState, failed, PENDING, ready, type DashboardState } from "./state.js";

export const CONTROLLER_DISPOSED = "dashboard_controller_disposed";

export type DashboardListener = (state: DashboardState) => void;

/**
 * Owns the dashboard state for one scope. Reads fan out to the gateway and
 * are published as a single snapshot; control operations flag the current
 * snapshot as refreshing, call the gateway, then re-read the aggregate.
 *
 * Operations are not serialized against each other. The published
 * snapshot's `isRefreshing` tracks how many protocol runs are in flight, so
 * it returns to false once the last of them settles, whatever the outcome.
 */
export class DashboardController {
  private state: DashboardState = PENDING;
  private readonly listeners = new Set<DashboardListener>();
  private inFlight = 0;
  private disposed = false;

  /** Settles once the eager refresh started by the constructor has finished. */
  readonly initialized: Promise<void>;

  constructor(private readonly gateway: DashboardGateway) {
    this.initialized = this.refresh(true).catch((error: unknown) => {
      log.warn("dashboard initial refresh failed", { error: errorMessage(error) });
    });
  }

  current(): DashboardState {
    this.assertActive();
    return this.state;
  }

  subscribe(listener: DashboardListener): () => void {
    this.assertActive();
    this.listeners.add(listener);
    listener(this.state);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.assertActive();
    this.disposed = true;
    this.listeners.clear();
    log.debug("dashboard controller disposed", { inFlight: this.inFlight });
  }

  /**
   * Re-reads all seven sources. Any failed read replaces the published
   * state with `failed` and rejects. `force` is accepted for callers that
   * want to state intent; every refresh issues the full set of reads.
   */
  async refresh(force = false): Promise<void> {
    this.assertActive();
    log.debug("dashboard refresh", { force });
    await this.track(() => this.reconcile());
  }

  async switchActiveModel(backend: Backend, model: string): Promise<void> {
    await this.control("switch_active_model", () => this.gateway.switchActiveModel(backend, model), {
      backend,
      model,
    });
  }

  async loadLocalModel(name: string): Promise<void> {
    await this.control("load_local_model", () => this.gateway.loadLocalModel(name), { name });
  }

  async unloadLocalModel(name: string): Promise<void> {
    await this.control("unload_local_model", () => this.gateway.unloadLocalModel(name), { name });
  }

  async switchActiveBackend(backend: Backend): Promise<void> {
    await this.control("switch_active_backend", () => this.gateway.setActiveBackend(backend), { backend });
  }

  async setActiveModel(model: string): Promise<void> {
    await this.control("set_active_model", () => this.gateway.setActiveModel(model), { model });
  }

  async configureRemote(credentials: RemoteCredentials): Promise<void> {
    await this.control("configure_remote", () => this.gateway.configureRemote(credentials), {
      baseUrl: credentials.baseUrl,
    });
  }

  async updateSettings(settings: DashboardSettings): Promise<void> {
    await this.control("update_settings", () => this.gateway.updateSettings(settings), {
      keys: Object.keys(settings),
    });
  }

  async testBackendConnection(backend: Backend): Promise<boolean> {
    this.assertActive();
    try {
      return await this.gateway.testConnection(backend);
    } catch (error) {
      log.warn("backend connection test failed", { backend, error: errorMessage(error) });
      return false;
    }
  }

  async getUsageStats(timeRange?: string): Promise<UsageStats> {
    this.assertActive();
    try {
      return await this.gateway.getUsageStats(timeRange);
    } catch (error) {
      log.warn("usage stats unavailable, using defaults", { timeRange, error: errorMessage(error) });
      return { ...DEFAULT_USAGE_STATS };
    }
  }

  /** Statuses keyed by backend, copied out of the current snapshot. */
  getBackendStatusMap(): Partial<Record<Backend, BackendStatus>> {
    this.assertActive();
    const out: Partial<Record<Backend, BackendStatus>> = {};
    if (this.state.status !== "ready") return out;
    for (const status of this.state.snapshot.backendStatuses) {
      out[status.backend] = { ...status };
    }
    return out;
  }

  private async control(operation: string, write: () => Promise<unknown>, meta: Record<string, unknown>): Promise<void> {
    this.assertActive();
    await this.track(async () => {
      try {
        await write();
      } catch (error) {
        log.warn("dashboard control operation failed", { operation, ...meta, error: errorMessage(error) });
        throw error;
      }
      log.info("dashboard control operation applied", { operation, ...meta });
      await this.reconcile();
    });
  }

  private async track(work: () => Promise<void>): Promise<void> {
    this.inFlight += 1;
    this.syncRefreshingFlag();
    try {
      await work();
    } finally {
      this.inFlight -= 1;
      this.syncRefreshingFlag();
    }
  }

  private syncRefreshingFlag(): void {
    if (this.state.status !== "ready") return;
    const next = withRefreshing(this.state.snapshot, this.inFlight > 0);
    if (next !== this.state.snapshot) this.publish(ready(next));
  }

  private async reconcile(): Promise<void> {
    let reads: DashboardReads;
    try {
      reads = await this.fetchReads();
    } catch (error) {
      this.publish(failed(error));
      throw error;
    }
    // This run is still counted; only other runs keep the flag raised.
    this.publish(ready(withRefreshing(createSnapshot(reads), this.inFlight > 1)));
  }

  private async fetchReads(): Promise<DashboardReads> {
    const [
      configuration,
      backendStatuses,
      localInventory,
      remoteStatus,
      remoteCatalog,
      healthSummary,
      performanceReports,
    ] = await Promise.all([
      this.gateway.getConfiguration(),
      this.gateway.getBackendStatuses(),
      this.gateway.getLocalInventory(),
      this.gateway.getRemoteStatus(),
      this.gateway.getRemoteCatalog(),
      this.gateway.getHealthSummary(),
      this.gateway.getPerformanceReports(),
    ]);
    return {
      configuration,
      backendStatuses,
      localInventory,
      remoteStatus,
      remoteCatalog,
      healthSummary,
      performanceReports,
    };
  }

  private publish(next: DashboardState): void {
    if (this.disposed) return;
    this.state = next;
    log.debug("dashboard state published", { state: describeState(next) });
    for (const listener of [...this.listeners]) {
      try {
        listener(next);
      } catch (error) {
        log.error("dashboard listener threw", { error: errorMessage(error) });
      }
    }
  }

  private assertActive(): void {
    if (this.disposed) throw new Error(CONTROLLER_DISPOSED);
  }
}
