// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * BlendedStrategy: α · classifier + (1 − α) · heuristic.
 * Kept as its own strategy so neither of the pure strategies averages silently.
 */

import type { NodeState } from "../types.js";
import type { ClassifierStrategy } from "./classifier.js";
import type { HeuristicStrategy } from "./heuristic.js";
import type { ScoringContext, ScoringResult, ScoringStrategy } from "./types.js";

export class BlendedStrategy implements ScoringStrategy {
  readonly name = "blended" as const;

  constructor(
    private readonly heuristic: HeuristicStrategy,
    private readonly classifier: ClassifierStrategy,
    private readonly alpha: number,
  ) {}

  score(candidates: readonly Readonly<NodeState>[], context: ScoringContext): ScoringResult {
    const learned = this.classifier.score(candidates, context);
    const rules = this.heuristic.score(candidates, context);

    const scores = new Map<string, number>();
    const breakdown = new Map<string, Record<string, number>>();

    for (const node of candidates) {
      const c = learned.scores.get(node.id) ?? 0;
      const h = rules.scores.get(node.id) ?? 0;
      scores.set(node.id, this.alpha * c + (1 - this.alpha) * h);

      const parts: Record<string, number> = { classifier: this.alpha * c };
      for (const [dimension, value] of Object.entries(rules.breakdown?.get(node.id) ?? {})) {
        parts[dimension] = (1 - this.alpha) * value;
      }
      breakdown.set(node.id, parts);
    }

    return {
      strategy: this.name,
      scores,
      breakdown,
      ...(learned.probabilities ? { probabilities: learned.probabilities } : {}),
    };
  }
}
