// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type {
  BackendStatus,
  DashboardConfiguration,
  HealthSummary,
  LocalInventory,
  RemoteStatus,
} from "../common/types.js";

/** Healthy means every backend reports healthy and a local model is loaded. */
export function summarizeHealth(
  configuration: DashboardConfiguration,
  statuses: readonly BackendStatus[],
  inventory: LocalInventory,
  remote: RemoteStatus,
): HealthSummary {
  return {
    perBackendStatus: statuses,
    localLoadedCount: inventory.loadedNames.size,
    localAvailableCount: inventory.models.length,
    remoteConnected: remote.connected,
    activeBackend: configuration.activeBackend,
    activeModel: configuration.activeModel,
    systemHealthy: statuses.every((s) => s.healthy) && inventory.loadedNames.size > 0,
  };
}
