// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Hard-constraint filter.
 *
 * A node is a candidate only if it satisfies every constraint:
 *   status == active
 *   available CPU / RAM ≥ demand
 *   GPU available when the task requires one
 *   latency estimate ≤ task.maxLatencyMs (when set)
 *
 * Every constraint is checked for every node so a rejection lists all of its
 * reasons, not just the first one hit.
 */

import { NoEligibleNodeError } from "../exceptions.js";
import { availableCpuCores, availableRamGb } from "../registry/capacity.js";
import type {
  MetricsSnapshot,
  NodeRejection,
  NodeState,
  RejectionReason,
  ResourceDelta,
  TaskDescriptor,
} from "../types.js";

const EPSILON = 1e-9;

export interface FilterResult {
  /** Snapshot order preserved. */
  candidates: Readonly<NodeState>[];
  rejected: NodeRejection[];
}

/** CPU/RAM a task will claim: its stated requirement, or the configured default. */
export function resolveDemand(task: TaskDescriptor, defaults: ResourceDelta): ResourceDelta {
  return {
    cpuCores: task.requiredCpuCores ?? defaults.cpuCores,
    ramGb: task.requiredRamGb ?? defaults.ramGb,
  };
}

export function checkNode(
  node: Readonly<NodeState>,
  task: TaskDescriptor,
  demand: ResourceDelta,
): RejectionReason[] {
  const reasons: RejectionReason[] = [];

  if (node.status !== "active") {
    reasons.push({ constraint: "status", detail: `status is ${node.status}` });
  }

  const cpu = availableCpuCores(node);
  if (demand.cpuCores > 0 && cpu + EPSILON < demand.cpuCores) {
    reasons.push({
      constraint: "cpu",
      detail: `needs ${demand.cpuCores} CPU cores, ${cpu.toFixed(2)} available`,
    });
  }

  const ram = availableRamGb(node);
  if (demand.ramGb > 0 && ram + EPSILON < demand.ramGb) {
    reasons.push({
      constraint: "ram",
      detail: `needs ${demand.ramGb} GB RAM, ${ram.toFixed(2)} available`,
    });
  }

  if (task.requiresGpu && !node.gpuAvailable) {
    reasons.push({ constraint: "gpu", detail: "GPU unavailable" });
  }

  if (task.maxLatencyMs !== undefined && node.latencyMs > task.maxLatencyMs) {
    reasons.push({
      constraint: "latency",
      detail: `latency ${node.latencyMs}ms exceeds ${task.maxLatencyMs}ms`,
    });
  }

  return reasons;
}

export function filterNodes(
  task: TaskDescriptor,
  snapshot: MetricsSnapshot,
  demand: ResourceDelta,
): FilterResult {
  const candidates: Readonly<NodeState>[] = [];
  const rejected: NodeRejection[] = [];

  for (const node of snapshot.nodes) {
    const reasons = checkNode(node, task, demand);
    if (reasons.length === 0) {
      candidates.push(node);
    } else {
      rejected.push({ nodeId: node.id, reasons });
    }
  }

  return { candidates, rejected };
}

/** filterNodes(), failing with NoEligibleNodeError when nothing survives. */
export function requireCandidates(
  task: TaskDescriptor,
  snapshot: MetricsSnapshot,
  demand: ResourceDelta,
): FilterResult {
  const result = filterNodes(task, snapshot, demand);
  if (result.candidates.length === 0) {
    throw new NoEligibleNodeError(task.id, result.rejected);
  }
  return result;
}
