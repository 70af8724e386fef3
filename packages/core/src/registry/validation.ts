// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Registry input boundary. A NaN or infinite reading would compare false
 * against every hard constraint, so nothing non-finite gets into node state.
 */

import { z } from "zod";

import { InvalidNodeDataError } from "../exceptions.js";
import { NODE_CATEGORIES } from "../types.js";
import type { NodeRegistration, ResourceDelta, TelemetryUpdate } from "../types.js";

const finite = z.number().finite();
const nonNegative = finite.nonnegative();
const positive = finite.positive();
const status = z.enum(["active", "degraded", "offline"]);

const RegistrationSchema = z.object({
  id: z.string().trim().min(1),
  category: z.enum(NODE_CATEGORIES),
  status: status.optional(),
  capacity: z.object({ cpuCores: positive, ramGb: positive }),
  load: z.object({ cpuPercent: finite.optional(), ramPercent: finite.optional() }).optional(),
  latencyMs: nonNegative.optional(),
  cost: z.object({ amount: nonNegative, unit: z.enum(["task", "hour"]) }),
  gpuAvailable: z.boolean().optional(),
  location: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

const TelemetrySchema = z.object({
  load: z
    .object({
      mode: z.enum(["absolute", "delta"]),
      cpuPercent: finite.optional(),
      ramPercent: finite.optional(),
    })
    .optional(),
  latencyMs: nonNegative.optional(),
  status: status.optional(),
  gpuAvailable: z.boolean().optional(),
});

const DeltaSchema = z.object({ cpuCores: nonNegative, ramGb: nonNegative });

function check(schema: z.ZodTypeAny, nodeId: string, value: unknown): void {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidNodeDataError(
      nodeId,
      result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`),
    );
  }
}

export function validateRegistration(registration: NodeRegistration): void {
  check(RegistrationSchema, registration.id, registration);
}

export function validateTelemetry(nodeId: string, update: TelemetryUpdate): void {
  check(TelemetrySchema, nodeId, update);
}

export function validateDelta(nodeId: string, delta: ResourceDelta): void {
  check(DeltaSchema, nodeId, delta);
}
