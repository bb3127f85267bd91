// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type {
  Backend,
  BackendStatus,
  DashboardConfiguration,
  DashboardSettings,
  HealthSummary,
  LocalInventory,
  PerformanceReport,
  RemoteCatalog,
  RemoteCredentials,
  RemoteStatus,
  UsageStats,
} from "../common/types.js";

/**
 * Everything the dashboard controller needs from the backend services.
 * Rejections are passed through to callers untouched; write results are
 * ignored by the controller, which re-reads the aggregate instead.
 */
export interface DashboardGateway {
  getConfiguration(): Promise<DashboardConfiguration>;
  getBackendStatuses(): Promise<BackendStatus[]>;
  getLocalInventory(): Promise<LocalInventory>;
  getRemoteStatus(): Promise<RemoteStatus>;
  getRemoteCatalog(): Promise<RemoteCatalog>;
  getHealthSummary(): Promise<HealthSummary>;
  getPerformanceReports(): Promise<PerformanceReport[]>;

  switchActiveModel(backend: Backend, model: string): Promise<unknown>;
  loadLocalModel(name: string): Promise<unknown>;
  unloadLocalModel(name: string): Promise<unknown>;

  setActiveBackend(backend: Backend): Promise<unknown>;
  setActiveModel(model: string): Promise<unknown>;
  configureRemote(credentials: RemoteCredentials): Promise<unknown>;
  updateSettings(settings: DashboardSettings): Promise<unknown>;
  testConnection(backend: Backend): Promise<boolean>;
  getUsageStats(timeRange?: string): Promise<UsageStats>;
}
