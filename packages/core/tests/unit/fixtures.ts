// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { vi } from "vitest";
import type { Mock } from "vitest";

import type { Logger } from "../../src/logging/logger.js";
import { NodeRegistry } from "../../src/registry/registry.js";
import type { NodeRegistryOptions } from "../../src/registry/registry.js";
import type {
  DecisionRecord,
  NodeCategory,
  NodeRegistration,
  NodeState,
  RoutingDecision,
  TaskDescriptor,
} from "../../src/types.js";

export const FIXED_TIME = "2026-03-01T12:00:00.000Z";

export function fixedClock(iso = FIXED_TIME): () => Date {
  return () => new Date(iso);
}

export function makeTask(overrides: Partial<TaskDescriptor> = {}): TaskDescriptor {
  return {
    id: "t-1",
    taskType: "generic",
    priority: 5,
    requiresGpu: false,
    costSensitivity: 5,
    ...overrides,
  };
}

export function makeRegistration(
  id: string,
  category: NodeCategory,
  overrides: Partial<NodeRegistration> = {},
): NodeRegistration {
  return {
    id,
    category,
    capacity: { cpuCores: 4, ramGb: 8 },
    cost: { amount: 0.25, unit: "task" },
    latencyMs: 50,
    ...overrides,
  };
}

export function makeNode(id: string, overrides: Partial<NodeState> = {}): NodeState {
  return {
    id,
    category: "edge",
    status: "active",
    capacity: { cpuCores: 4, ramGb: 8 },
    load: { cpuPercent: 0, ramPercent: 0 },
    latencyMs: 50,
    cost: { amount: 0.25, unit: "task" },
    gpuAvailable: false,
    reservations: 0,
    ...overrides,
  };
}

export function makeRegistry(nodes: NodeRegistration[], options: NodeRegistryOptions = {}): NodeRegistry {
  const registry = new NodeRegistry({ clock: fixedClock(), ...options });
  for (const node of nodes) registry.register(node);
  return registry;
}

/**
 * Two-node fleet with dyadic numbers, so heuristic scores are exact:
 * with equal weights and `routingTask()`, e1 scores 0.75 and c1 scores 0.5.
 */
export function twoNodeRegistry(options: NodeRegistryOptions = {}): NodeRegistry {
  return makeRegistry(
    [
      makeRegistration("e1", "edge", { load: { cpuPercent: 25, ramPercent: 25 }, latencyMs: 50 }),
      makeRegistration("c1", "cloud", {
        capacity: { cpuCores: 16, ramGb: 64 },
        load: { cpuPercent: 50, ramPercent: 50 },
        latencyMs: 100,
      }),
    ],
    { ambient: { networkLatencyMs: 80, costMultipliers: { edge: 1, cloud: 2, gpu: 4 } }, ...options },
  );
}

export const EQUAL_WEIGHTS = { headroom: 0.25, latency: 0.25, cost: 0.25, affinity: 0.25 };

export function routingTask(overrides: Partial<TaskDescriptor> = {}): TaskDescriptor {
  return makeTask({
    priority: 10,
    maxLatencyMs: 200,
    latencySensitivity: 10,
    costSensitivity: 1,
    ...overrides,
  });
}

export type SpyLogger = { [K in keyof Logger]: Mock };

export function spyLogger(): SpyLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), trace: vi.fn() };
}

export function makeDecision(overrides: Partial<RoutingDecision> = {}): RoutingDecision {
  return {
    taskId: "t-1",
    nodeId: "e1",
    category: "edge",
    confidence: 0.75,
    scores: new Map([["e1", 0.75]]),
    strategy: "heuristic",
    degraded: false,
    decisiveDimension: "cost",
    rationale: "Routed 'generic' task t-1 to e1 [edge]",
    rejected: [],
    snapshotVersion: 3,
    timestamp: FIXED_TIME,
    ...overrides,
  };
}

export function makeRecord(
  nodeId: string,
  finalState: "completed" | "failed",
  outcome: { latencyMs: number; cost: number; error?: string },
  overrides: { taskId?: string; degraded?: boolean } = {},
): DecisionRecord {
  const taskId = overrides.taskId ?? `task-${nodeId}`;
  return {
    task: makeTask({ id: taskId }),
    decision: makeDecision({ taskId, nodeId, degraded: overrides.degraded ?? false }),
    outcome: { success: finalState === "completed", ...outcome },
    finalState,
  };
}
