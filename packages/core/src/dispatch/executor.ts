// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// Execution boundary. The engine hands a DispatchHandle to a TaskExecutor and
// expects an ExecutionOutcome back; the executor never touches the registry.

import type {
  ExecutionOutcome,
  NodeCategory,
  Reservation,
  RoutingDecision,
  TaskDescriptor,
} from "../types.js";

export interface DispatchHandle {
  readonly task: TaskDescriptor;
  readonly decision: RoutingDecision;
  readonly reservation: Reservation;
  /** True once complete() or cancel() has run. */
  readonly settled: boolean;
  /** Report the execution result; releases the reservation. Idempotent. */
  complete(outcome: ExecutionOutcome): void;
  /** Abandon the dispatch; releases the reservation. Idempotent. */
  cancel(reason?: string): void;
}

export interface TaskExecutor {
  execute(handle: DispatchHandle): Promise<ExecutionOutcome>;
}

// ── Simulated executor ───────────────────────────────────────────────────────

interface CategoryProfile {
  /** Base latency range in ms. */
  latencyMs: readonly [number, number];
  costPerTask: number;
  /** Per task type speed/cost multiplier; unknown types use 1.0. */
  multipliers: Readonly<Record<string, number>>;
}

export const EXECUTION_PROFILES: Readonly<Record<NodeCategory, CategoryProfile>> = {
  edge: {
    latencyMs: [50, 150],
    costPerTask: 0.01,
    multipliers: {
      fraud_detection: 0.8,
      sensor_alert: 0.6,
      image_classification: 1.5,
      ml_training: 2.0,
      daily_report: 1.2,
    },
  },
  cloud: {
    latencyMs: [200, 500],
    costPerTask: 0.025,
    multipliers: {
      fraud_detection: 1.0,
      sensor_alert: 1.3,
      image_classification: 0.9,
      ml_training: 1.1,
      daily_report: 0.7,
    },
  },
  gpu: {
    latencyMs: [300, 600],
    costPerTask: 0.05,
    multipliers: {
      fraud_detection: 1.2,
      sensor_alert: 1.5,
      image_classification: 0.4,
      ml_training: 0.3,
      daily_report: 1.3,
    },
  },
};

export interface SimulatedExecutorOptions {
  /** Uniform [0, 1) source; Math.random by default. */
  rng?: () => number;
  /** Probability that a run fails. */
  failureRate?: number;
  /** Wait for the simulated latency; set to false for instant runs. */
  realtime?: boolean;
}

/** Stand-in for the edge/cloud/GPU node services. */
export class SimulatedExecutor implements TaskExecutor {
  private readonly rng: () => number;
  private readonly failureRate: number;
  private readonly realtime: boolean;

  constructor(options: SimulatedExecutorOptions = {}) {
    this.rng = options.rng ?? Math.random;
    this.failureRate = options.failureRate ?? 0;
    this.realtime = options.realtime ?? true;
  }

  async execute(handle: DispatchHandle): Promise<ExecutionOutcome> {
    const profile = EXECUTION_PROFILES[handle.decision.category];
    const multiplier = profile.multipliers[handle.task.taskType] ?? 1.0;
    const [min, max] = profile.latencyMs;
    const latencyMs = Math.round((min + this.rng() * (max - min)) * multiplier);

    if (this.realtime) {
      await new Promise((r) => setTimeout(r, latencyMs));
    }

    if (this.rng() < this.failureRate) {
      return {
        success: false,
        latencyMs,
        cost: 0,
        error: `simulated failure on ${handle.decision.nodeId}`,
      };
    }
    return {
      success: true,
      latencyMs,
      cost: Math.round(profile.costPerTask * multiplier * 10_000) / 10_000,
    };
  }
}
