// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export { DashboardController, CONTROLLER_DISPOSED, type DashboardListener } from "./controller.js";
export type { DashboardGateway } from "./gateway.js";
export { summarizeHealth } from "./health.js";
export { InMemoryGateway, type InMemoryGatewayOptions } from "./memory-gateway.js";
export { buildDashboardRoutes, serializeState, type SerializedSnapshot, type SerializedState } from "./routes.js";
export { loadSeed, parseSeed, seedSchema, type DashboardSeed } from "./seed.js";
export { createDashboardServer, type DashboardServer } from "./server.js";
export { createSnapshot, snapshotsEqual, withRefreshing, type DashboardReads, type DashboardSnapshot } from "./snapshot.js";
export { describeState, snapshotOf, statesEqual, type DashboardState } from "./state.js";
export * from "../common/types.js";
