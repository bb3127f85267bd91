// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { isDeepStrictEqual } from "node:util";
import type {
  BackendStatus,
  DashboardConfiguration,
  HealthSummary,
  LocalInventory,
  PerformanceReport,
  RemoteCatalog,
  RemoteStatus,
} from "../common/types.js";

/** The seven gateway reads a snapshot is assembled from. */
export interface DashboardReads {
  readonly configuration: DashboardConfiguration;
  readonly backendStatuses: readonly BackendStatus[];
  readonly localInventory: LocalInventory;
  readonly remoteStatus: RemoteStatus;
  readonly remoteCatalog: RemoteCatalog;
  readonly healthSummary: HealthSummary;
  readonly performanceReports: readonly PerformanceReport[];
}

export interface DashboardSnapshot extends DashboardReads {
  readonly isRefreshing: boolean;
}

/**
 * Builds an idle snapshot from the reads. Each read is copied and frozen
 * throughout, so later writes to the gateway's objects do not show up in it
 * and nothing reached through it can be assigned.
 */
export function createSnapshot(reads: DashboardReads): DashboardSnapshot {
  return Object.freeze({
    configuration: frozenCopy(reads.configuration),
    backendStatuses: frozenCopy(reads.backendStatuses),
    localInventory: frozenCopy(reads.localInventory),
    remoteStatus: frozenCopy(reads.remoteStatus),
    remoteCatalog: frozenCopy(reads.remoteCatalog),
    healthSummary: frozenCopy(reads.healthSummary),
    performanceReports: frozenCopy(reads.performanceReports),
    isRefreshing: false,
  });
}

export function withRefreshing(snapshot: DashboardSnapshot, isRefreshing: boolean): DashboardSnapshot {
  if (snapshot.isRefreshing === isRefreshing) return snapshot;
  return Object.freeze({ ...snapshot, isRefreshing });
}

function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}

// Object.freeze leaves Set.add working; loaded names are guarded by their ReadonlySet type.
function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return value;
  const children: unknown[] = value instanceof Set ? [...value] : Object.values(value);
  Object.freeze(value);
  for (const child of children) deepFreeze(child);
  return value;
}

export function snapshotsEqual(a: DashboardSnapshot, b: DashboardSnapshot): boolean {
  return a === b || isDeepStrictEqual(a, b);
}
