// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Classifier artifact loader.
 * The artifact is a JSON file written by the offline training job. A missing,
 * unreadable or version-skewed artifact never throws out of here: the caller
 * gets `{ ok: false, reason }` and runs heuristic-only.
 */

import { existsSync, readFileSync } from "fs";

import { z } from "zod";

import { SchemaMismatchError } from "../exceptions.js";
import { FEATURE_SCHEMA, assertSchemaCompatible } from "../features/extractor.js";
import type { FeatureSchema } from "../features/extractor.js";
import { LinearSoftmaxModel } from "./model.js";
import type { ProbabilityPredictor } from "./types.js";

const ArtifactSchema = z
  .object({
    format: z.literal("linear-softmax"),
    version: z.string().min(1),
    featureSchema: z.object({
      version: z.string().min(1),
      names: z.array(z.string()).min(1),
    }),
    classes: z.array(z.string().min(1)).min(2),
    weights: z.array(z.array(z.number())),
    bias: z.array(z.number()),
    mean: z.array(z.number()).optional(),
    scale: z.array(z.number()).optional(),
  })
  .superRefine((a, ctx) => {
    const width = a.featureSchema.names.length;
    if (a.weights.length !== a.classes.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["weights"], message: "one row per class required" });
    }
    if (a.weights.some((row) => row.length !== width)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["weights"], message: `rows must have ${width} columns` });
    }
    if (a.bias.length !== a.classes.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["bias"], message: "one bias per class required" });
    }
    for (const key of ["mean", "scale"] as const) {
      const vector = a[key];
      if (vector && vector.length !== width) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `must have ${width} entries` });
      }
    }
  });

export type ClassifierArtifact = z.infer<typeof ArtifactSchema>;

export type ArtifactLoadResult =
  | { ok: true; predictor: ProbabilityPredictor }
  | { ok: false; reason: string };

/** Validate an already-parsed artifact against the extractor schema. */
export function parseClassifierArtifact(
  raw: unknown,
  schema: FeatureSchema = FEATURE_SCHEMA,
): ArtifactLoadResult {
  const result = ArtifactSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    return { ok: false, reason: `invalid artifact (${issues.join("; ")})` };
  }
  try {
    assertSchemaCompatible(result.data.featureSchema, schema);
  } catch (err) {
    if (err instanceof SchemaMismatchError) {
      return { ok: false, reason: err.message };
    }
    throw err;
  }
  return { ok: true, predictor: new LinearSoftmaxModel(result.data) };
}

export function loadClassifierArtifact(
  path: string | undefined,
  schema: FeatureSchema = FEATURE_SCHEMA,
): ArtifactLoadResult {
  if (!path) {
    return { ok: false, reason: "no classifier artifact configured" };
  }
  if (!existsSync(path)) {
    return { ok: false, reason: `classifier artifact not found at '${path}'` };
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    return { ok: false, reason: `failed to read classifier artifact '${path}': ${String(err)}` };
  }
  return parseClassifierArtifact(raw, schema);
}
