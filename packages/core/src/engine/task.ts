// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Task submission boundary: structural validation of incoming task records.
 * Accepts snake_case or camelCase keys; the result is frozen.
 */

import { z } from "zod";

import { InvalidTaskError } from "../exceptions.js";
import type { TaskDescriptor } from "../types.js";

const ordinal = z.number().int().min(1).max(10);

const TaskSchema = z.object({
  id: z.string().trim().min(1),
  taskType: z.string().trim().min(1),
  priority: ordinal,
  maxLatencyMs: z.number().positive().optional(),
  latencySensitivity: ordinal.optional(),
  requiredCpuCores: z.number().nonnegative().optional(),
  requiredRamGb: z.number().nonnegative().optional(),
  requiresGpu: z.boolean().default(false),
  costSensitivity: ordinal.default(5),
  payload: z.record(z.unknown()).optional(),
});

export type TaskInput = z.input<typeof TaskSchema>;

const ALIASES: Record<string, string> = {
  task_id: "id",
  task_type: "taskType",
  type: "taskType",
  max_latency_ms: "maxLatencyMs",
  max_latency: "maxLatencyMs",
  latency_sensitivity: "latencySensitivity",
  required_cpu: "requiredCpuCores",
  required_cpu_cores: "requiredCpuCores",
  required_ram: "requiredRamGb",
  required_ram_gb: "requiredRamGb",
  requires_gpu: "requiresGpu",
  required_gpu: "requiresGpu",
  requiresGPU: "requiresGpu",
  cost_sensitivity: "costSensitivity",
};

function normalizeKeys(raw: unknown): unknown {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) return raw;
  return Object.fromEntries(Object.entries(raw).map(([k, v]) => [ALIASES[k] ?? k, v]));
}

/** Validate a raw task record. Throws InvalidTaskError listing every issue. */
export function parseTask(raw: unknown): TaskDescriptor {
  const result = TaskSchema.safeParse(normalizeKeys(raw));
  if (!result.success) {
    throw new InvalidTaskError(
      result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`),
    );
  }
  const { payload, ...rest } = result.data;
  return Object.freeze({
    ...rest,
    ...(payload !== undefined ? { payload: Object.freeze({ ...payload }) } : {}),
  });
}
