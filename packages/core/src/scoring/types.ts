// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { FeatureVector } from "../features/extractor.js";
import type { MetricsSnapshot, NodeState, StrategyName, TaskDescriptor } from "../types.js";

export interface ScoringContext {
  task: TaskDescriptor;
  features: FeatureVector;
  snapshot: MetricsSnapshot;
}

export interface ScoringResult {
  strategy: StrategyName;
  /** node id → score in [0,1]; candidate order preserved. */
  scores: Map<string, number>;
  /** node id → weighted contribution per dimension; sums to the node's score. */
  breakdown?: Map<string, Record<string, number>>;
  /** Category probabilities, when a classifier was consulted. */
  probabilities?: Record<string, number>;
  /**
   * Per-feature contribution to the classifier's margin between two categories,
   * when the predictor can attribute it.
   */
  attribute?: (winner: string, runnerUp: string) => number[] | undefined;
}

/**
 * One way of ranking filtered candidates. New strategies plug in here without
 * the engine changing.
 */
export interface ScoringStrategy {
  readonly name: StrategyName;
  score(candidates: readonly Readonly<NodeState>[], context: ScoringContext): ScoringResult;
}

/** The trained model behind the classifier strategy. */
export interface ProbabilityPredictor {
  readonly version: string;
  readonly classes: readonly string[];
  readonly featureSchema: { version: string; names: readonly string[] };
  /** Probability per class name; sums to 1. */
  predictProba(values: readonly number[]): Record<string, number>;
  /** Contribution of each feature to logit(a) − logit(b), if the model is linear. */
  attribute?(values: readonly number[], a: string, b: string): number[];
}
