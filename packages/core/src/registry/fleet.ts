// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { FleetRouteConfig, NodeConfig } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import type { NodeRegistration } from "../types.js";
import { NodeRegistry } from "./registry.js";

export function toRegistration(node: NodeConfig): NodeRegistration {
  return {
    id: node.id,
    category: node.category,
    status: node.status,
    capacity: { cpuCores: node.cpuCores, ramGb: node.ramGb },
    load: { cpuPercent: node.cpuPercent, ramPercent: node.ramPercent },
    latencyMs: node.latencyMs,
    cost: { amount: node.cost, unit: node.costUnit },
    gpuAvailable: node.gpuAvailable,
    ...(node.location !== undefined ? { location: node.location } : {}),
    tags: node.tags,
  };
}

/** Build a registry populated with the configured fleet and ambient signals. */
export function registryFromConfig(config: FleetRouteConfig, logger?: Logger): NodeRegistry {
  const registry = new NodeRegistry({
    ambient: config.ambient,
    ...(logger ? { logger } : {}),
  });
  for (const node of config.nodes) {
    registry.register(toRegistration(node));
  }
  return registry;
}
