// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { errorMessage } from "../common/logger.js";
import type { DashboardController } from "./controller.js";
import type { DashboardSnapshot } from "./snapshot.js";
import type { DashboardState } from "./state.js";

const backendSchema = z.enum(["local", "remote"]);

const refreshSchema = z.object({ force: z.boolean().default(false) });
const switchSchema = z.object({ backend: backendSchema, model: z.string().min(1) });
const localModelSchema = z.object({ name: z.string().min(1) });
const testConnectionSchema = z.object({ backend: backendSchema });
const usageQuerySchema = z.object({ timeRange: z.string().min(1).optional() });

export type SerializedSnapshot = Omit<DashboardSnapshot, "localInventory"> & {
  localInventory: Omit<DashboardSnapshot["localInventory"], "loadedNames"> & { loadedNames: string[] };
};

export type SerializedState =
  | { status: "pending" }
  | { status: "ready"; snapshot: SerializedSnapshot }
  | { status: "failed"; error: string };

export function serializeState(state: DashboardState): SerializedState {
  switch (state.status) {
    case "pending":
      return { status: "pending" };
    case "ready": {
      const { localInventory } = state.snapshot;
      return {
        status: "ready",
        snapshot: {
          ...state.snapshot,
          localInventory: { ...localInventory, loadedNames: [...localInventory.loadedNames].sort() },
        },
      };
    }
    case "failed":
      return { status: "failed", error: errorMessage(state.error) };
  }
}

export function buildDashboardRoutes(app: FastifyInstance, controller: DashboardController): void {
  async function run(reply: FastifyReply, operation: () => Promise<void>) {
    try {
      await operation();
    } catch (error) {
      return reply.code(502).send({ error: errorMessage(error) });
    }
    return reply.send(serializeState(controller.current()));
  }

  app.get("/dashboard/api/state", async (_req, reply) => {
    return reply.send(serializeState(controller.current()));
  });

  app.post("/dashboard/api/refresh", async (req, reply) => {
    const body = refreshSchema.safeParse(req.body ?? {});
    if (!body.success) return reply.code(400).send({ error: "invalid_request" });
    return run(reply, () => controller.refresh(body.data.force));
  });

  app.post("/dashboard/api/switch", async (req, reply) => {
    const body = switchSchema.safeParse(req.body);
    if (!body.success) return reply.code(400).send({ error: "invalid_request" });
    return run(reply, () => controller.switchActiveModel(body.data.backend, body.data.model));
  });

  app.post("/dashboard/api/local/load", async (req, reply) => {
    const body = localModelSchema.safeParse(req.body);
    if (!body.success) return reply.code(400).send({ error: "invalid_request" });
    return run(reply, () => controller.loadLocalModel(body.data.name));
  });

  app.post("/dashboard/api/local/unload", async (req, reply) => {
    const body = localModelSchema.safeParse(req.body);
    if (!body.success) return reply.code(400).send({ error: "invalid_request" });
    return run(reply, () => controller.unloadLocalModel(body.data.name));
  });

  app.post("/dashboard/api/test-connection", async (req, reply) => {
    const body = testConnectionSchema.safeParse(req.body);
    if (!body.success) return reply.code(400).send({ error: "invalid_request" });
    const ok = await controller.testBackendConnection(body.data.backend);
    return reply.send({ backend: body.data.backend, ok });
  });

  app.get("/dashboard/api/usage", async (req, reply) => {
    const query = usageQuerySchema.safeParse(req.query);
    if (!query.success) return reply.code(400).send({ error: "invalid_request" });
    return reply.send(await controller.getUsageStats(query.data.timeRange));
  });
}
