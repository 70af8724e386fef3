// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for FleetRoute.
 * Reads fleetroute.yaml from the project directory or ~/.fleetroute/config.yaml.
 * Validates with Zod and provides typed defaults.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "../exceptions.js";

// ── Zod schema ───────────────────────────────────────────────────────────────

const CategorySchema = z.enum(["edge", "cloud", "gpu"]);

const ReservationSchema = z.object({
  cpuCores: z.number().nonnegative().default(0.5),
  ramGb: z.number().nonnegative().default(0.5),
});

const EngineSchema = z.object({
  strategy: z.enum(["heuristic", "classifier", "blended"]).default("heuristic"),
  classifierPath: z.string().optional(),
  /** Classifier share in blended mode. */
  blendAlpha: z.number().min(0).max(1).default(0.5),
  tieEpsilon: z.number().positive().default(1e-6),
  /** Reserved on the winner when a task states no CPU/RAM requirement. */
  defaultReservation: ReservationSchema.default({}),
});

const WeightsSchema = z.object({
  headroom: z.number().min(0).max(1).default(0.3),
  latency: z.number().min(0).max(1).default(0.25),
  cost: z.number().min(0).max(1).default(0.25),
  affinity: z.number().min(0).max(1).default(0.2),
});

const HeuristicSchema = z.object({
  weights: WeightsSchema.default({}),
  /** Latency budget assumed for tasks that state no maxLatencyMs. */
  referenceLatencyMs: z.number().positive().default(500),
  /** Converts hourly node cost into a per-task equivalent. */
  taskHoursEstimate: z.number().positive().default(1 / 60),
});

const AmbientSchema = z.object({
  networkLatencyMs: z.number().nonnegative().default(100),
  costMultipliers: z
    .object({
      edge: z.number().positive().default(1.0),
      cloud: z.number().positive().default(2.5),
      gpu: z.number().positive().default(5.0),
    })
    .default({}),
});

const NodeSchema = z.object({
  id: z.string().min(1),
  category: CategorySchema,
  status: z.enum(["active", "degraded", "offline"]).default("active"),
  cpuCores: z.number().positive(),
  ramGb: z.number().positive(),
  cpuPercent: z.number().min(0).max(100).default(0),
  ramPercent: z.number().min(0).max(100).default(0),
  latencyMs: z.number().nonnegative().default(50),
  cost: z.number().nonnegative(),
  costUnit: z.enum(["task", "hour"]).default("hour"),
  gpuAvailable: z.boolean().default(false),
  location: z.string().optional(),
  tags: z.array(z.string()).default([]),
});

const HistorySchema = z.object({
  enabled: z.boolean().default(true),
  dbPath: z.string().default(join(homedir(), ".fleetroute", "history.db")),
});

const SimulatorSchema = z.object({
  intervalMs: z.number().int().positive().default(2000),
  spikeProbability: z.number().min(0).max(1).default(0.05),
});

const LoggingSchema = z.object({
  level: z.enum(["DEBUG", "INFO", "WARNING", "ERROR"]).default("INFO"),
  /** Decision trace file; empty string disables it. */
  file: z.string().default("fleetroute-decisions.log"),
});

const DEFAULT_FLEET: z.input<typeof NodeSchema>[] = [
  { id: "Edge-01", category: "edge", cpuCores: 4, ramGb: 8, latencyMs: 8, cost: 0.5, location: "Factory Floor" },
  { id: "Edge-02", category: "edge", cpuCores: 4, ramGb: 8, latencyMs: 15, cost: 0.5, location: "Warehouse" },
  { id: "Cloud-AWS-East", category: "cloud", cpuCores: 16, ramGb: 64, latencyMs: 90, cost: 2.0, location: "us-east-1" },
  { id: "Cloud-GCP-West", category: "cloud", cpuCores: 16, ramGb: 64, latencyMs: 110, cost: 2.0, location: "us-west1" },
  {
    id: "GPU-Cluster-01",
    category: "gpu",
    cpuCores: 32,
    ramGb: 128,
    latencyMs: 120,
    cost: 5.0,
    gpuAvailable: true,
    location: "Data Center",
  },
];

const ConfigSchema = z.object({
  engine: EngineSchema.default({}),
  heuristic: HeuristicSchema.default({}),
  ambient: AmbientSchema.default({}),
  nodes: z.array(NodeSchema).default(DEFAULT_FLEET),
  history: HistorySchema.default({}),
  simulator: SimulatorSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type FleetRouteConfig = z.infer<typeof ConfigSchema>;
export type NodeConfig = z.infer<typeof NodeSchema>;
export type HeuristicWeights = z.infer<typeof WeightsSchema>;
export type LogLevel = FleetRouteConfig["logging"]["level"];

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

/** Convert snake_case YAML keys to camelCase for Zod schema. */
function toCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(toCamel);
  if (obj !== null && typeof obj === "object") {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [
        k.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()),
        toCamel(v),
      ]),
    );
  }
  return obj;
}

// ── Loader ───────────────────────────────────────────────────────────────────

const SEARCH_PATHS = [
  "fleetroute.yaml",
  "config/fleetroute.yaml",
  join(homedir(), ".fleetroute", "config.yaml"),
];

/** Validate an already-parsed config object (snake_case or camelCase keys). */
export function parseConfig(raw: unknown, source = "<inline>"): FleetRouteConfig {
  const result = ConfigSchema.safeParse(toCamel(raw ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigurationError(`Invalid configuration in '${source}':\n${issues}`);
  }
  return result.data;
}

export function loadConfig(configPath?: string): FleetRouteConfig {
  const paths = configPath ? [configPath] : SEARCH_PATHS;
  const found = paths.find((p) => existsSync(p));

  if (!found) {
    if (configPath) {
      throw new ConfigurationError(`Config file not found: '${configPath}'`);
    }
    return ConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to read config at '${found}': ${String(err)}`);
  }

  return parseConfig(raw, found);
}

export const defaultConfig: FleetRouteConfig = ConfigSchema.parse({});
