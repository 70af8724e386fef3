// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ClassifierStrategy: each candidate scores the predicted probability of its
 * category. A category the model never learned scores 0; such a node can still
 * win through tie-breaking when nothing better survives the filter.
 */

import { ClassifierUnavailableError, SchemaMismatchError } from "../exceptions.js";
import { assertSchemaCompatible } from "../features/extractor.js";
import type { NodeState } from "../types.js";
import type {
  ProbabilityPredictor,
  ScoringContext,
  ScoringResult,
  ScoringStrategy,
} from "./types.js";

export class ClassifierStrategy implements ScoringStrategy {
  readonly name = "classifier" as const;

  /** Throws SchemaMismatchError when the predictor was fitted on another schema. */
  constructor(private readonly predictor: ProbabilityPredictor) {
    assertSchemaCompatible(predictor.featureSchema);
  }

  get modelVersion(): string {
    return this.predictor.version;
  }

  score(candidates: readonly Readonly<NodeState>[], context: ScoringContext): ScoringResult {
    const { values, schema } = context.features;
    if (values.length !== this.predictor.featureSchema.names.length) {
      throw new SchemaMismatchError(
        `${schema.version}[${values.length}]`,
        `${this.predictor.featureSchema.version}[${this.predictor.featureSchema.names.length}]`,
      );
    }

    const probabilities = this.predictor.predictProba(values);
    for (const [name, p] of Object.entries(probabilities)) {
      if (!Number.isFinite(p) || p < 0 || p > 1) {
        throw new ClassifierUnavailableError(`model returned invalid probability ${p} for '${name}'`);
      }
    }

    const scores = new Map<string, number>();
    for (const node of candidates) {
      scores.set(node.id, probabilities[node.category] ?? 0);
    }

    const predictor = this.predictor;
    return {
      strategy: this.name,
      scores,
      probabilities,
      attribute: (winner, runnerUp) => predictor.attribute?.(values, winner, runnerUp),
    };
  }
}
