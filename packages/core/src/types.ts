// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Core shared types for FleetRoute.
 * The registry, the decision engine and the CLI operate on these types.
 */

export const NODE_CATEGORIES = ["edge", "cloud", "gpu"] as const;

export type NodeCategory = (typeof NODE_CATEGORIES)[number];

export type NodeStatus = "active" | "degraded" | "offline";

export interface ResourceLoad {
  /** 0–100 */
  cpuPercent: number;
  /** 0–100 */
  ramPercent: number;
}

export interface NodeCapacity {
  cpuCores: number;
  ramGb: number;
}

export interface NodeCost {
  amount: number;
  unit: "task" | "hour";
}

export interface NodeState {
  id: string;
  category: NodeCategory;
  status: NodeStatus;
  /** Fixed at registration. */
  capacity: NodeCapacity;
  /** Effective load: last telemetry reading plus outstanding reservations. */
  load: ResourceLoad;
  latencyMs: number;
  cost: NodeCost;
  gpuAvailable: boolean;
  location?: string;
  tags?: string[];
  /** Outstanding reservation count. */
  reservations: number;
}

/** What a caller supplies to `NodeRegistry.register`. */
export interface NodeRegistration {
  id: string;
  category: NodeCategory;
  status?: NodeStatus;
  capacity: NodeCapacity;
  load?: Partial<ResourceLoad>;
  latencyMs?: number;
  cost: NodeCost;
  gpuAvailable?: boolean;
  location?: string;
  tags?: string[];
}

export interface LoadReading {
  mode: "absolute" | "delta";
  cpuPercent?: number;
  ramPercent?: number;
}

export interface TelemetryUpdate {
  load?: LoadReading;
  latencyMs?: number;
  status?: NodeStatus;
  gpuAvailable?: boolean;
}

export interface AmbientSignals {
  networkLatencyMs: number;
  costMultipliers: Record<NodeCategory, number>;
}

export interface MetricsSnapshot {
  /** Registry mutation counter at capture time. */
  readonly version: number;
  /** ISO time of the last registry mutation. */
  readonly capturedAt: string;
  readonly nodes: readonly Readonly<NodeState>[];
  readonly ambient: Readonly<AmbientSignals>;
}

export interface ResourceDelta {
  cpuCores: number;
  ramGb: number;
}

export interface Reservation {
  readonly nodeId: string;
  readonly delta: Readonly<ResourceDelta>;
  readonly cpuPercent: number;
  readonly ramPercent: number;
}

export interface TaskDescriptor {
  readonly id: string;
  readonly taskType: string;
  /** 1–10, higher = more urgent */
  readonly priority: number;
  /** Hard ceiling on the node's current latency estimate. */
  readonly maxLatencyMs?: number;
  /** 1–10, higher = more latency-sensitive */
  readonly latencySensitivity?: number;
  readonly requiredCpuCores?: number;
  readonly requiredRamGb?: number;
  readonly requiresGpu: boolean;
  /** 1–10, higher = more cost-averse */
  readonly costSensitivity: number;
  readonly payload?: Readonly<Record<string, unknown>>;
}

export type ConstraintKind = "status" | "cpu" | "ram" | "gpu" | "latency";

export interface RejectionReason {
  constraint: ConstraintKind;
  detail: string;
}

export interface NodeRejection {
  nodeId: string;
  reasons: RejectionReason[];
}

export type ScoreDimension = "headroom" | "latency" | "cost" | "affinity";

export type StrategyName = "heuristic" | "classifier" | "blended";

export type DecisionState =
  | "received"
  | "featurized"
  | "filtered"
  | "scored"
  | "dispatched"
  | "completed"
  | "failed";

export interface RoutingDecision {
  readonly taskId: string;
  readonly nodeId: string;
  readonly category: NodeCategory;
  /** 0.0–1.0 */
  readonly confidence: number;
  /** Insertion order = filtering order. */
  readonly scores: ReadonlyMap<string, number>;
  readonly strategy: StrategyName;
  /** True when the configured classifier could not be used. */
  readonly degraded: boolean;
  readonly degradedReason?: string;
  readonly decisiveDimension: string;
  readonly rationale: string;
  readonly rejected: readonly NodeRejection[];
  readonly snapshotVersion: number;
  readonly timestamp: string;
}

export interface ExecutionOutcome {
  success: boolean;
  latencyMs: number;
  cost: number;
  error?: string;
}

/** Immutable record handed to the persistence collaborator. */
export interface DecisionRecord {
  task: TaskDescriptor;
  decision: RoutingDecision;
  outcome: ExecutionOutcome;
  finalState: "completed" | "failed";
}
