// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/simulator/telemetry.ts
// TelemetrySimulator: random-walk telemetry for a registry with no live feed.
//
// Per tick, for every non-offline node:
//   cpu       ± uniform(5)
//   ram       ± uniform(2)
//   latency   spike of 50–200ms with probability spikeProbability, otherwise
//             10% decay toward the category baseline (edge 10ms, others 80ms)
// Then ambient network latency follows congestion:
//   base × (1 + (edgeLoad + cloudLoad) / 100) ± 20, never below 10ms.

import { categoryLoad } from "../features/extractor.js";
import type { Logger } from "../logging/logger.js";
import type { NodeRegistry } from "../registry/registry.js";
import type { NodeCategory } from "../types.js";

const LATENCY_BASELINE: Record<NodeCategory, number> = {
  edge: 10,
  cloud: 80,
  gpu: 80,
};

const MIN_NETWORK_LATENCY_MS = 10;

export interface TelemetrySimulatorOptions {
  intervalMs?: number;
  spikeProbability?: number;
  /** Uncongested network latency. */
  baseNetworkLatencyMs?: number;
  /** Uniform [0, 1) source; Math.random by default. */
  rng?: () => number;
  logger?: Logger;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class TelemetrySimulator {
  private timer: NodeJS.Timeout | null = null;
  private readonly intervalMs: number;
  private readonly spikeProbability: number;
  private readonly baseNetworkLatencyMs: number;
  private readonly rng: () => number;
  private readonly logger: Logger | undefined;
  private ticks = 0;

  constructor(
    private readonly registry: NodeRegistry,
    options: TelemetrySimulatorOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? 2_000;
    this.spikeProbability = options.spikeProbability ?? 0.05;
    this.baseNetworkLatencyMs = options.baseNetworkLatencyMs ?? 100;
    this.rng = options.rng ?? Math.random;
    this.logger = options.logger;
  }

  get tickCount(): number {
    return this.ticks;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Advance every node by one step. */
  tick(): void {
    for (const node of this.registry.all()) {
      if (node.status === "offline") continue;

      const cpu = this.uniform(-5, 5);
      const ram = this.uniform(-2, 2);
      let latencyMs: number;
      if (this.rng() < this.spikeProbability) {
        latencyMs = node.latencyMs + this.uniform(50, 200);
        this.logger?.debug(`latency spike on ${node.id}: ${round2(latencyMs)}ms`);
      } else {
        latencyMs = node.latencyMs * 0.9 + LATENCY_BASELINE[node.category] * 0.1;
      }

      this.registry.updateTelemetry(node.id, {
        load: { mode: "delta", cpuPercent: cpu, ramPercent: ram },
        latencyMs: round2(latencyMs),
      });
    }

    const snapshot = this.registry.snapshot();
    const congestion = (categoryLoad(snapshot, "edge") + categoryLoad(snapshot, "cloud")) / 100;
    const network = this.baseNetworkLatencyMs * (1 + congestion) + this.uniform(-20, 20);
    this.registry.updateAmbient({ networkLatencyMs: round2(Math.max(MIN_NETWORK_LATENCY_MS, network)) });
    this.ticks += 1;
  }

  private uniform(min: number, max: number): number {
    return min + this.rng() * (max - min);
  }
}
