// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { readFile } from "node:fs/promises";
import { z } from "zod";

const backendSchema = z.enum(["local", "remote"]);

const metricsSchema = z.object({
  totalRequests: z.number().int().nonnegative(),
  successfulRequests: z.number().int().nonnegative(),
  failedRequests: z.number().int().nonnegative(),
  averageResponseTimeMs: z.number().nonnegative(),
  totalTokensUsed: z.number().int().nonnegative(),
  errorRate: z.number().min(0).max(1),
  uptimePercentage: z.number().min(0).max(100),
});

export const seedSchema = z.object({
  activeBackend: backendSchema,
  activeModel: z.string().min(1),
  models: z.array(
    z.object({
      name: z.string().min(1),
      backend: backendSchema,
      contextWindow: z.number().int().positive().default(4096),
      maxTokens: z.number().int().positive().default(2048),
      temperature: z.number().default(0.7),
      topP: z.number().default(0.9),
    }),
  ),
  localModels: z.array(
    z.object({
      name: z.string().min(1),
      sizeGb: z.number().nonnegative(),
      loaded: z.boolean().default(false),
      contextWindow: z.number().int().positive().default(4096),
      maxTokens: z.number().int().positive().default(2048),
      lastUsedAt: z.string().optional(),
    }),
  ),
  remoteModels: z.array(z.string().min(1)).default([]),
  remote: z
    .object({
      apiKey: z.string().optional(),
      baseUrl: z.string().optional(),
      connected: z.boolean().default(false),
      creditsRemaining: z.number().optional(),
      rateLimitRemaining: z.number().int().optional(),
    })
    .default({}),
  performance: z.array(z.object({ backend: backendSchema, metrics: metricsSchema })).default([]),
  settings: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  usage: z
    .object({
      totalRequests: z.number().int().nonnegative(),
      successfulRequests: z.number().int().nonnegative(),
      failedRequests: z.number().int().nonnegative(),
      totalTokensUsed: z.number().int().nonnegative(),
      averageResponseTimeMs: z.number().nonnegative(),
      requestsPerHour: z.number().nonnegative(),
    })
    .optional(),
});

export type DashboardSeed = z.infer<typeof seedSchema>;

export function parseSeed(raw: unknown): DashboardSeed {
  return seedSchema.parse(raw);
}

export async function loadSeed(path: string): Promise<DashboardSeed> {
  const text = await readFile(path, "utf8");
  return parseSeed(JSON.parse(text));
}
