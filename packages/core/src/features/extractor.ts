// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * FeatureExtractor: maps a task and a metrics snapshot to the numeric vector
 * the classifier was fitted on.
 *
 * Schema fv1 (order is part of the contract):
 *   0 priority              1–10
 *   1 latency_requirement   1–10, higher = tighter
 *   2 requires_gpu          0 | 1
 *   3 edge_load             0–100, mean over non-offline edge nodes
 *   4 cloud_load            0–100
 *   5 gpu_load              0–100
 *   6 network_latency       ms
 *   7 cost_sensitivity      1–10
 *
 * A category with no reachable node reports 100 (saturated), so a fixed width is
 * kept whatever the fleet looks like.
 */

import { SchemaMismatchError } from "../exceptions.js";
import { NODE_CATEGORIES } from "../types.js";
import type { MetricsSnapshot, NodeCategory, TaskDescriptor } from "../types.js";

export interface FeatureSchema {
  readonly version: string;
  readonly names: readonly string[];
}

export const FEATURE_SCHEMA: FeatureSchema = Object.freeze({
  version: "fv1",
  names: Object.freeze([
    "priority",
    "latency_requirement",
    "requires_gpu",
    "edge_load",
    "cloud_load",
    "gpu_load",
    "network_latency",
    "cost_sensitivity",
  ]),
});

export interface FeatureVector {
  readonly schema: FeatureSchema;
  readonly values: readonly number[];
}

const DEFAULT_LATENCY_REQUIREMENT = 5;
const SATURATED_LOAD = 100;

/** [upper bound in ms, ordinal requirement]: first matching band wins. */
const LATENCY_BANDS: ReadonlyArray<readonly [number, number]> = [
  [10, 10],
  [25, 9],
  [50, 8],
  [100, 7],
  [200, 6],
  [400, 5],
  [800, 4],
  [1600, 3],
  [3200, 2],
];

/** Ordinal 1–10 latency requirement of a task. */
export function latencyRequirement(task: TaskDescriptor): number {
  if (task.latencySensitivity !== undefined) return task.latencySensitivity;
  const maxMs = task.maxLatencyMs;
  if (maxMs === undefined) return DEFAULT_LATENCY_REQUIREMENT;
  const band = LATENCY_BANDS.find(([limit]) => maxMs <= limit);
  return band ? band[1] : 1;
}

export function categoryLoad(snapshot: MetricsSnapshot, category: NodeCategory): number {
  const loads = snapshot.nodes
    .filter((n) => n.category === category && n.status !== "offline")
    .map((n) => Math.max(n.load.cpuPercent, n.load.ramPercent));
  if (loads.length === 0) return SATURATED_LOAD;
  return loads.reduce((acc, l) => acc + l, 0) / loads.length;
}

export function extractFeatures(task: TaskDescriptor, snapshot: MetricsSnapshot): FeatureVector {
  const values = [
    task.priority,
    latencyRequirement(task),
    task.requiresGpu ? 1 : 0,
    ...NODE_CATEGORIES.map((c) => categoryLoad(snapshot, c)),
    snapshot.ambient.networkLatencyMs,
    task.costSensitivity,
  ];
  return Object.freeze({ schema: FEATURE_SCHEMA, values: Object.freeze(values) });
}

/** Throws SchemaMismatchError unless `expected` matches the extractor's schema exactly. */
export function assertSchemaCompatible(
  expected: { version: string; names: readonly string[] },
  schema: FeatureSchema = FEATURE_SCHEMA,
): void {
  const same =
    expected.version === schema.version &&
    expected.names.length === schema.names.length &&
    expected.names.every((name, i) => name === schema.names[i]);
  if (!same) {
    throw new SchemaMismatchError(
      `${schema.version}[${schema.names.length}]`,
      `${expected.version}[${expected.names.length}]`,
    );
  }
}

/** Feature name → value, for rationale and debugging output. */
export function describeFeatures(vector: FeatureVector): Record<string, number> {
  return Object.fromEntries(vector.schema.names.map((name, i) => [name, vector.values[i] ?? 0]));
}
