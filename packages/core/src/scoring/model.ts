// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * LinearSoftmaxModel: multinomial logistic regression over the feature vector.
 * Fitted offline; this class only evaluates it.
 *
 *   x'ᵢ = (xᵢ − meanᵢ) / scaleᵢ
 *   z_c = bias_c + Σᵢ w_cᵢ · x'ᵢ
 *   p_c = softmax(z)_c
 */

import type { ProbabilityPredictor } from "./types.js";

export interface LinearSoftmaxParams {
  version: string;
  featureSchema: { version: string; names: readonly string[] };
  classes: readonly string[];
  /** One row per class, one column per feature. */
  weights: readonly (readonly number[])[];
  bias: readonly number[];
  mean?: readonly number[];
  scale?: readonly number[];
}

export class LinearSoftmaxModel implements ProbabilityPredictor {
  readonly version: string;
  readonly classes: readonly string[];
  readonly featureSchema: { version: string; names: readonly string[] };
  private readonly params: LinearSoftmaxParams;

  constructor(params: LinearSoftmaxParams) {
    this.params = params;
    this.version = params.version;
    this.classes = params.classes;
    this.featureSchema = params.featureSchema;
  }

  predictProba(values: readonly number[]): Record<string, number> {
    const logits = this.params.weights.map((row, c) =>
      this.standardize(values).reduce((acc, x, i) => acc + x * (row[i] ?? 0), this.params.bias[c] ?? 0),
    );
    const max = Math.max(...logits);
    const exps = logits.map((z) => Math.exp(z - max));
    const total = exps.reduce((acc, e) => acc + e, 0);

    const result: Record<string, number> = {};
    this.classes.forEach((name, c) => {
      result[name] = (exps[c] ?? 0) / total;
    });
    return result;
  }

  attribute(values: readonly number[], a: string, b: string): number[] {
    const rowA = this.params.weights[this.classes.indexOf(a)];
    const rowB = this.params.weights[this.classes.indexOf(b)];
    const x = this.standardize(values);
    return x.map((xi, i) => xi * ((rowA?.[i] ?? 0) - (rowB?.[i] ?? 0)));
  }

  private standardize(values: readonly number[]): number[] {
    const { mean, scale } = this.params;
    return values.map((v, i) => {
      const m = mean?.[i] ?? 0;
      const s = scale?.[i] ?? 1;
      return s === 0 ? 0 : (v - m) / s;
    });
  }
}
