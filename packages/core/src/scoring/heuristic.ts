// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * HeuristicStrategy: weighted sum of four normalised sub-scores:
 *
 *   headroom   1 − max(load fraction)                       weight=0.30
 *   latency    1 − latency / task max latency, clamped       weight=0.25
 *   cost       cheapest effective cost / this node's cost    weight=0.25
 *   affinity   category fit for priority, latency and cost   weight=0.20
 *
 * Weights must sum to 1.0; construction fails otherwise.
 */

import { ConfigurationError } from "../exceptions.js";
import { latencyRequirement } from "../features/extractor.js";
import { headroom } from "../registry/capacity.js";
import type {
  AmbientSignals,
  NodeCategory,
  NodeState,
  ScoreDimension,
  TaskDescriptor,
} from "../types.js";
import type { ScoringContext, ScoringResult, ScoringStrategy } from "./types.js";

export type Weights = Record<ScoreDimension, number>;

export const DEFAULT_WEIGHTS: Readonly<Weights> = Object.freeze({
  headroom: 0.3,
  latency: 0.25,
  cost: 0.25,
  affinity: 0.2,
});

export const WEIGHT_SUM_TOLERANCE = 1e-9;

export interface HeuristicOptions {
  weights?: Weights;
  /** Latency budget for tasks without maxLatencyMs. */
  referenceLatencyMs?: number;
  /** Hours per task, for nodes billed by the hour. */
  taskHoursEstimate?: number;
}

function clamp(value: number, min = 0, max = 1): number {
  return Math.max(min, Math.min(max, value));
}

export function assertWeights(weights: Weights): void {
  const sum = weights.headroom + weights.latency + weights.cost + weights.affinity;
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError(`Heuristic weights must sum to 1.0, got ${sum}`);
  }
}

/** Per-task cost of a node after ambient multipliers. */
export function effectiveCost(
  node: Pick<NodeState, "cost" | "category">,
  ambient: Pick<AmbientSignals, "costMultipliers">,
  taskHoursEstimate: number,
): number {
  const perTask = node.cost.unit === "hour" ? node.cost.amount * taskHoursEstimate : node.cost.amount;
  return perTask * ambient.costMultipliers[node.category];
}

/**
 * How well a category suits the task, 0–1.
 *   edge   latency-sensitive or cost-averse work
 *   cloud  urgent work that tolerates latency
 *   gpu    GPU work; otherwise only when cost is no concern
 */
export function categoryAffinity(category: NodeCategory, task: TaskDescriptor): number {
  const priority = (task.priority - 1) / 9;
  const latency = (latencyRequirement(task) - 1) / 9;
  const cost = (task.costSensitivity - 1) / 9;

  switch (category) {
    case "edge":
      return clamp((latency + cost) / 2);
    case "cloud":
      return clamp((priority + (1 - latency)) / 2);
    case "gpu":
      return task.requiresGpu ? 1 : clamp((1 - cost) * 0.5);
  }
}

export class HeuristicStrategy implements ScoringStrategy {
  readonly name = "heuristic" as const;
  private readonly weights: Weights;
  private readonly referenceLatencyMs: number;
  private readonly taskHoursEstimate: number;

  constructor(options: HeuristicOptions = {}) {
    this.weights = { ...(options.weights ?? DEFAULT_WEIGHTS) };
    assertWeights(this.weights);
    this.referenceLatencyMs = options.referenceLatencyMs ?? 500;
    this.taskHoursEstimate = options.taskHoursEstimate ?? 1 / 60;
  }

  /** Raw sub-scores (unweighted) for one node. */
  subScores(
    node: Readonly<NodeState>,
    context: ScoringContext,
    cheapest: number,
  ): Record<ScoreDimension, number> {
    const maxLatency = context.task.maxLatencyMs ?? this.referenceLatencyMs;
    const cost = effectiveCost(node, context.snapshot.ambient, this.taskHoursEstimate);
    return {
      headroom: clamp(headroom(node)),
      latency: maxLatency > 0 ? clamp(1 - node.latencyMs / maxLatency) : 0,
      cost: cost <= 0 ? 1 : clamp(cheapest / cost),
      affinity: categoryAffinity(node.category, context.task),
    };
  }

  score(candidates: readonly Readonly<NodeState>[], context: ScoringContext): ScoringResult {
    const cheapest = Math.min(
      ...candidates.map((n) => effectiveCost(n, context.snapshot.ambient, this.taskHoursEstimate)),
    );

    const scores = new Map<string, number>();
    const breakdown = new Map<string, Record<string, number>>();

    for (const node of candidates) {
      const sub = this.subScores(node, context, cheapest);
      const weighted: Record<ScoreDimension, number> = {
        headroom: sub.headroom * this.weights.headroom,
        latency: sub.latency * this.weights.latency,
        cost: sub.cost * this.weights.cost,
        affinity: sub.affinity * this.weights.affinity,
      };
      const total = weighted.headroom + weighted.latency + weighted.cost + weighted.affinity;
      scores.set(node.id, clamp(total));
      breakdown.set(node.id, weighted);
    }

    return { strategy: this.name, scores, breakdown };
  }
}
