// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// Synthetic task mix for `fleetroute simulate` and load experiments.

import type { TaskInput } from "../engine/task.js";
import { randomInt } from "./random.js";
import type { Rng } from "./random.js";

export interface TaskProfile {
  taskType: string;
  priority: readonly [number, number];
  maxLatencyMs?: number;
  requiredCpuCores: number;
  requiredRamGb: number;
  requiresGpu: boolean;
  costSensitivity: number;
}

export const TASK_PROFILES: readonly TaskProfile[] = [
  { taskType: "fraud_detection", priority: [7, 10], maxLatencyMs: 100, requiredCpuCores: 1, requiredRamGb: 2, requiresGpu: false, costSensitivity: 5 },
  { taskType: "sensor_alert", priority: [8, 10], maxLatencyMs: 50, requiredCpuCores: 0.5, requiredRamGb: 0.5, requiresGpu: false, costSensitivity: 7 },
  { taskType: "image_classification", priority: [4, 7], maxLatencyMs: 500, requiredCpuCores: 4, requiredRamGb: 8, requiresGpu: true, costSensitivity: 3 },
  { taskType: "ml_training", priority: [2, 5], requiredCpuCores: 8, requiredRamGb: 32, requiresGpu: true, costSensitivity: 2 },
  { taskType: "daily_report", priority: [1, 3], requiredCpuCores: 2, requiredRamGb: 4, requiresGpu: false, costSensitivity: 9 },
];

/** Draw one task from the profile mix. */
export function randomTask(rng: Rng, id: string, profiles: readonly TaskProfile[] = TASK_PROFILES): TaskInput {
  const profile = profiles[randomInt(rng, 0, profiles.length - 1)];
  if (!profile) {
    throw new RangeError("randomTask needs at least one task profile");
  }
  return {
    id,
    taskType: profile.taskType,
    priority: randomInt(rng, profile.priority[0], profile.priority[1]),
    ...(profile.maxLatencyMs !== undefined ? { maxLatencyMs: profile.maxLatencyMs } : {}),
    requiredCpuCores: profile.requiredCpuCores,
    requiredRamGb: profile.requiredRamGb,
    requiresGpu: profile.requiresGpu,
    costSensitivity: profile.costSensitivity,
  };
}
