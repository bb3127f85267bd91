import { vi, type Mock } from "vitest";
import type { DashboardConfiguration, HealthSummary } from "../../src/common/types.js";
import type { DashboardGateway } from "../../src/dashboard/gateway.js";
import type { DashboardReads } from "../../src/dashboard/snapshot.js";

export function configuration(activeModel = "llama-2-7b"): DashboardConfiguration {
  return {
    activeBackend: "local",
    activeModel,
    backends: {
      local: { backend: "local", apiKeyConfigured: false, timeoutSeconds: 30, maxRetries: 3 },
      remote: { backend: "remote", apiKeyConfigured: true, timeoutSeconds: 30, maxRetries: 3 },
    },
    models: {
      "llama-2-7b": {
        name: "llama-2-7b",
        backend: "local",
        contextWindow: 4096,
        maxTokens: 2048,
        temperature: 0.7,
        topP: 0.9,
      },
    },
  };
}

export function healthSummary(activeModel = "llama-2-7b"): HealthSummary {
  return {
    perBackendStatus: [],
    localLoadedCount: 0,
    localAvailableCount: 0,
    remoteConnected: false,
    activeBackend: "local",
    activeModel,
    systemHealthy: false,
  };
}

export function emptyReads(activeModel = "llama-2-7b"): DashboardReads {
  return {
    configuration: configuration(activeModel),
    backendStatuses: [],
    localInventory: { models: [], loadedNames: new Set() },
    remoteStatus: { connected: false },
    remoteCatalog: { modelNames: [], total: 0 },
    healthSummary: healthSummary(activeModel),
    performanceReports: [],
  };
}

export type StubGateway = {
  [K in keyof DashboardGateway]: Mock<DashboardGateway[K]>;
};

/** Gateway whose reads resolve to empty data and whose writes succeed. */
export function stubGateway(activeModel = "llama-2-7b"): StubGateway {
  return {
    getConfiguration: vi.fn<DashboardGateway["getConfiguration"]>(async () => configuration(activeModel)),
    getBackendStatuses: vi.fn<DashboardGateway["getBackendStatuses"]>(async () => []),
    getLocalInventory: vi.fn<DashboardGateway["getLocalInventory"]>(async () => ({ models: [], loadedNames: new Set<string>() })),
    getRemoteStatus: vi.fn<DashboardGateway["getRemoteStatus"]>(async () => ({ connected: false })),
    getRemoteCatalog: vi.fn<DashboardGateway["getRemoteCatalog"]>(async () => ({ modelNames: [], total: 0 })),
    getHealthSummary: vi.fn<DashboardGateway["getHealthSummary"]>(async () => healthSummary(activeModel)),
    getPerformanceReports: vi.fn<DashboardGateway["getPerformanceReports"]>(async () => []),
    switchActiveModel: vi.fn<DashboardGateway["switchActiveModel"]>(async () => undefined),
    loadLocalModel: vi.fn<DashboardGateway["loadLocalModel"]>(async () => undefined),
    unloadLocalModel: vi.fn<DashboardGateway["unloadLocalModel"]>(async () => undefined),
    setActiveBackend: vi.fn<DashboardGateway["setActiveBackend"]>(async () => undefined),
    setActiveModel: vi.fn<DashboardGateway["setActiveModel"]>(async () => undefined),
    configureRemote: vi.fn<DashboardGateway["configureRemote"]>(async () => undefined),
    updateSettings: vi.fn<DashboardGateway["updateSettings"]>(async () => undefined),
    testConnection: vi.fn<DashboardGateway["testConnection"]>(async () => true),
    getUsageStats: vi.fn<DashboardGateway["getUsageStats"]>(async () => ({
      totalRequests: 10,
      successfulRequests: 9,
      failedRequests: 1,
      totalTokensUsed: 1200,
      averageResponseTimeMs: 250,
      requestsPerHour: 2,
    })),
  };
}

export const READ_OPERATIONS = [
  "getConfiguration",
  "getBackendStatuses",
  "getLocalInventory",
  "getRemoteStatus",
  "getRemoteCatalog",
  "getHealthSummary",
  "getPerformanceReports",
] as const;

/** A promise plus the handles to settle it from the test body. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
