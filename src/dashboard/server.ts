// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import Fastify, { type FastifyInstance } from "fastify";
import type { DashboardConfig } from "../common/config.js";
import { DashboardController } from "./controller.js";
import type { DashboardGateway } from "./gateway.js";
import { buildDashboardRoutes } from "./routes.js";

export interface DashboardServer {
  app: FastifyInstance;
  controller: DashboardController;
}

export function createDashboardServer(
  config: Pick<DashboardConfig, "logLevel">,
  gateway: DashboardGateway,
  options: { logger?: boolean } = {},
): DashboardServer {
  const app = Fastify({ logger: options.logger === false ? false : { level: config.logLevel } });
  const controller = new DashboardController(gateway);

  app.get("/health", async () => ({ ok: true }));
  buildDashboardRoutes(app, controller);

  app.addHook("onClose", async () => {
    controller.dispose();
  });

  return { app, controller };
}
