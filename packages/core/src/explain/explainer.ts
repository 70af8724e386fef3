// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Explainer: turns a finished selection into a human-readable rationale and
 * names the decisive dimension so the choice can be re-derived:
 *
 *   breakdown available   dimension with the largest share of the margin over
 *                         the runner-up (largest contribution if unopposed)
 *   scores tied           the tie-break that settled it (headroom / node id)
 *   linear classifier     feature with the largest share of the logit margin
 *                         between the winner's and runner-up's categories
 *   otherwise             "classifier probability"
 */

import type { FeatureVector } from "../features/extractor.js";
import { headroom } from "../registry/capacity.js";
import type { Selection } from "../scoring/select.js";
import { DEFAULT_TIE_EPSILON } from "../scoring/select.js";
import type { ScoringResult } from "../scoring/types.js";
import type { NodeRejection, TaskDescriptor } from "../types.js";

export interface ExplainInput {
  task: TaskDescriptor;
  selection: Selection;
  scoring: ScoringResult;
  features: FeatureVector;
  rejected: readonly NodeRejection[];
  tieEpsilon?: number;
}

export interface Explanation {
  decisiveDimension: string;
  /** One sentence on why that dimension decided it. */
  decisiveDetail: string;
  rationale: string;
}

function argmax(entries: Array<[string, number]>): [string, number] | undefined {
  let best: [string, number] | undefined;
  for (const entry of entries) {
    if (!best || entry[1] > best[1]) best = entry;
  }
  return best;
}

function fromBreakdown(input: ExplainInput): Pick<Explanation, "decisiveDimension" | "decisiveDetail"> | null {
  const { selection, scoring } = input;
  const mine = scoring.breakdown?.get(selection.winner.id);
  if (!mine) return null;

  const runnerUp = selection.runnerUp;
  if (!runnerUp) {
    const [dimension, value]: [string, number] = argmax(Object.entries(mine)) ?? ["score", selection.score];
    return {
      decisiveDimension: dimension,
      decisiveDetail: `sole candidate, ${dimension} contributes ${value.toFixed(3)} of ${selection.score.toFixed(3)}`,
    };
  }

  const theirs: Record<string, number> = scoring.breakdown?.get(runnerUp.id) ?? {};
  const margins = Object.entries(mine).map(([d, v]): [string, number] => [d, v - (theirs[d] ?? 0)]);
  const [dimension, margin]: [string, number] = argmax(margins) ?? ["score", 0];
  return {
    decisiveDimension: dimension,
    decisiveDetail: `${dimension} ${margin >= 0 ? "+" : ""}${margin.toFixed(3)} over ${runnerUp.id}`,
  };
}

function fromClassifier(input: ExplainInput): Pick<Explanation, "decisiveDimension" | "decisiveDetail"> {
  const { selection, scoring, features } = input;
  const category = selection.winner.category;
  const probability = scoring.probabilities?.[category] ?? selection.score;
  const runnerUp = selection.runnerUp;

  if (runnerUp && runnerUp.category !== category && scoring.attribute) {
    const contributions = scoring.attribute(category, runnerUp.category);
    if (contributions) {
      const best = argmax(contributions.map((c, i): [string, number] => [features.schema.names[i] ?? `f${i}`, c]));
      if (best) {
        return {
          decisiveDimension: best[0],
          decisiveDetail: `feature ${best[0]} adds ${best[1].toFixed(3)} to the logit margin of ${category} over ${runnerUp.category}`,
        };
      }
    }
  }
  return {
    decisiveDimension: "classifier probability",
    decisiveDetail: `classifier gives ${category} probability ${probability.toFixed(3)}`,
  };
}

function decisive(input: ExplainInput): Pick<Explanation, "decisiveDimension" | "decisiveDetail"> {
  const eps = input.tieEpsilon ?? DEFAULT_TIE_EPSILON;
  const { selection, scoring } = input;
  const runnerUp = selection.runnerUp;

  if (runnerUp) {
    const runnerScore = scoring.scores.get(runnerUp.id) ?? 0;
    if (Math.abs(selection.score - runnerScore) <= eps) {
      const byHeadroom = Math.abs(headroom(selection.winner) - headroom(runnerUp)) > eps;
      return byHeadroom
        ? {
            decisiveDimension: "headroom tie-break",
            decisiveDetail: `score tied with ${runnerUp.id}; more headroom wins`,
          }
        : {
            decisiveDimension: "node id tie-break",
            decisiveDetail: `score and headroom tied with ${runnerUp.id}; smaller node id wins`,
          };
    }
  }

  return fromBreakdown(input) ?? fromClassifier(input);
}

export function explain(input: ExplainInput): Explanation {
  const { task, selection, scoring, rejected } = input;
  const { winner } = selection;
  const { decisiveDimension, decisiveDetail } = decisive(input);

  const notes: string[] = [];
  if (task.requiresGpu) notes.push("task requires GPU acceleration");
  if (task.priority >= 8) notes.push(`high priority task (P${task.priority})`);
  notes.push(`${winner.id} has ${Math.round(headroom(winner) * 100)}% headroom`);
  if (rejected.length > 0) {
    notes.push(
      `excluded ${rejected
        .map((r) => `${r.nodeId} (${r.reasons.map((reason) => reason.detail).join(", ")})`)
        .join("; ")}`,
    );
  }

  const rationale =
    `Routed '${task.taskType}' task ${task.id} to ${winner.id} [${winner.category}] ` +
    `with score ${selection.score.toFixed(3)} via ${scoring.strategy} scoring. ` +
    `Decisive: ${decisiveDetail}. ` +
    notes.join(" | ");

  return { decisiveDimension, decisiveDetail, rationale };
}
