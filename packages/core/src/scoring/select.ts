// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// Winner selection. Highest score wins; scores within epsilon of the highest tie
// and are broken by strictly greater headroom, then by the smallest node id.

import { headroom } from "../registry/capacity.js";
import type { NodeState } from "../types.js";

export const DEFAULT_TIE_EPSILON = 1e-6;

export interface Selection {
  winner: Readonly<NodeState>;
  score: number;
  runnerUp?: Readonly<NodeState>;
}

/**
 * Nodes whose key is within epsilon of the best key. Anchoring on the maximum
 * keeps band membership independent of candidate order.
 */
function topBand(
  nodes: readonly Readonly<NodeState>[],
  key: (node: Readonly<NodeState>) => number,
  epsilon: number,
): Readonly<NodeState>[] {
  const best = Math.max(...nodes.map(key));
  return nodes.filter((node) => best - key(node) <= epsilon);
}

function pick(
  candidates: readonly Readonly<NodeState>[],
  scores: ReadonlyMap<string, number>,
  epsilon: number,
): Readonly<NodeState> | undefined {
  if (candidates.length === 0) return undefined;
  const tied = topBand(candidates, (node) => scores.get(node.id) ?? 0, epsilon);
  const roomiest = topBand(tied, headroom, epsilon);
  return roomiest.reduce((a, b) => (b.id < a.id ? b : a));
}

export function selectWinner(
  candidates: readonly Readonly<NodeState>[],
  scores: ReadonlyMap<string, number>,
  epsilon = DEFAULT_TIE_EPSILON,
): Selection | null {
  const winner = pick(candidates, scores, epsilon);
  if (!winner) return null;
  const runnerUp = pick(
    candidates.filter((node) => node !== winner),
    scores,
    epsilon,
  );
  return {
    winner,
    score: scores.get(winner.id) ?? 0,
    ...(runnerUp ? { runnerUp } : {}),
  };
}
