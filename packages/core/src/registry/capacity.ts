// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// Capacity arithmetic shared by the registry, the filter and the scorers.

import type { NodeState, ResourceDelta } from "../types.js";

export function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, value));
}

/** Fraction of unused capacity on the busiest resource, 0–1. */
export function headroom(node: Pick<NodeState, "load">): number {
  return 1 - Math.max(node.load.cpuPercent, node.load.ramPercent) / 100;
}

export function availableCpuCores(node: Pick<NodeState, "load" | "capacity">): number {
  return node.capacity.cpuCores * (1 - node.load.cpuPercent / 100);
}

export function availableRamGb(node: Pick<NodeState, "load" | "capacity">): number {
  return node.capacity.ramGb * (1 - node.load.ramPercent / 100);
}

/** Convert an absolute resource demand into load percentages on a node. */
export function deltaToPercent(
  node: Pick<NodeState, "capacity">,
  delta: ResourceDelta,
): { cpuPercent: number; ramPercent: number } {
  return {
    cpuPercent: (delta.cpuCores / node.capacity.cpuCores) * 100,
    ramPercent: (delta.ramGb / node.capacity.ramGb) * 100,
  };
}
