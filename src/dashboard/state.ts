// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { errorMessage } from "../common/logger.js";
import { snapshotsEqual, type DashboardSnapshot } from "./snapshot.js";

export type DashboardState =
  | { readonly status: "pending" }
  | { readonly status: "ready"; readonly snapshot: DashboardSnapshot }
  | { readonly status: "failed"; readonly error: unknown };

export const PENDING: DashboardState = Object.freeze<DashboardState>({ status: "pending" });

export function ready(snapshot: DashboardSnapshot): DashboardState {
  return Object.freeze<DashboardState>({ status: "ready", snapshot });
}

export function failed(error: unknown): DashboardState {
  return Object.freeze<DashboardState>({ status: "failed", error });
}

export function snapshotOf(state: DashboardState): DashboardSnapshot | null {
  return state.status === "ready" ? state.snapshot : null;
}

export function statesEqual(a: DashboardState, b: DashboardState): boolean {
  switch (a.status) {
    case "pending":
      return b.status === "pending";
    case "ready":
      return b.status === "ready" && snapshotsEqual(a.snapshot, b.snapshot);
    case "failed":
      return b.status === "failed" && a.error === b.error;
  }
}

/** One-line summary used in logs. */
export function describeState(state: DashboardState): string {
  switch (state.status) {
    case "pending":
      return "pending";
    case "ready":
      return `ready(${state.snapshot.configuration.activeBackend}/${state.snapshot.configuration.activeModel}${
        state.snapshot.isRefreshing ? ", refreshing" : ""
      })`;
    case "failed":
      return `failed(${errorMessage(state.error)})`;
    default: {
      const unreachable: never = state;
      return unreachable;
    }
  }
}
