// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/registry/registry.ts
// NodeRegistry: the single owner of all node state.
//
// Every method is synchronous, so on the event loop each call runs to completion
// before any other: snapshot(), reserve() and release() share one serialisation
// point and two decisions can never both spend the same spare capacity.
//
// Effective load = last telemetry reading + sum of outstanding reservations.
// Reservations are kept as individual entries so that release() restores the
// previous load exactly rather than by floating-point subtraction.

import {
  CapacityExceededError,
  DuplicateNodeError,
  NodeInUseError,
  UnknownNodeError,
} from "../exceptions.js";
import type { Logger } from "../logging/logger.js";
import type {
  AmbientSignals,
  MetricsSnapshot,
  NodeRegistration,
  NodeState,
  Reservation,
  ResourceDelta,
  ResourceLoad,
  TelemetryUpdate,
} from "../types.js";
import { clampPercent, deltaToPercent } from "./capacity.js";
import { validateDelta, validateRegistration, validateTelemetry } from "./validation.js";

/** Tolerance for floating-point noise when checking the 100% ceiling. */
const CAPACITY_EPSILON = 1e-9;

const DEFAULT_AMBIENT: AmbientSignals = {
  networkLatencyMs: 100,
  costMultipliers: { edge: 1.0, cloud: 2.5, gpu: 5.0 },
};

type StaticNodeFields = Omit<NodeState, "load" | "reservations">;

interface NodeEntry {
  node: StaticNodeFields;
  telemetry: ResourceLoad;
  reservations: Reservation[];
}

export interface NodeRegistryOptions {
  ambient?: Partial<AmbientSignals>;
  /** Injected for deterministic snapshots in tests. */
  clock?: () => Date;
  logger?: Logger;
}

export class NodeRegistry {
  private readonly nodes = new Map<string, NodeEntry>();
  private readonly clock: () => Date;
  private readonly logger: Logger | undefined;
  private ambient: AmbientSignals;
  private version = 0;
  private updatedAt: string;
  private cached: MetricsSnapshot | null = null;

  constructor(options: NodeRegistryOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
    this.ambient = {
      networkLatencyMs: options.ambient?.networkLatencyMs ?? DEFAULT_AMBIENT.networkLatencyMs,
      costMultipliers: {
        ...DEFAULT_AMBIENT.costMultipliers,
        ...options.ambient?.costMultipliers,
      },
    };
    this.updatedAt = this.clock().toISOString();
  }

  /** Add a node. Capacity ceilings are fixed from here on. */
  register(registration: NodeRegistration): Readonly<NodeState> {
    validateRegistration(registration);
    if (this.nodes.has(registration.id)) {
      throw new DuplicateNodeError(registration.id);
    }
    const entry: NodeEntry = {
      node: {
        id: registration.id,
        category: registration.category,
        status: registration.status ?? "active",
        capacity: { ...registration.capacity },
        latencyMs: registration.latencyMs ?? 0,
        cost: { ...registration.cost },
        gpuAvailable: registration.gpuAvailable ?? false,
        ...(registration.location !== undefined ? { location: registration.location } : {}),
        ...(registration.tags !== undefined ? { tags: [...registration.tags] } : {}),
      },
      telemetry: {
        cpuPercent: clampPercent(registration.load?.cpuPercent ?? 0),
        ramPercent: clampPercent(registration.load?.ramPercent ?? 0),
      },
      reservations: [],
    };
    this.nodes.set(registration.id, entry);
    this.touch();
    return materialize(entry);
  }

  /** Apply one telemetry reading. Absolute readings are idempotent. */
  updateTelemetry(nodeId: string, update: TelemetryUpdate): Readonly<NodeState> {
    const entry = this.entry(nodeId);
    validateTelemetry(nodeId, update);

    if (update.load) {
      const { mode, cpuPercent, ramPercent } = update.load;
      if (cpuPercent !== undefined) {
        entry.telemetry.cpuPercent = clampPercent(
          mode === "absolute" ? cpuPercent : entry.telemetry.cpuPercent + cpuPercent,
        );
      }
      if (ramPercent !== undefined) {
        entry.telemetry.ramPercent = clampPercent(
          mode === "absolute" ? ramPercent : entry.telemetry.ramPercent + ramPercent,
        );
      }
    }
    if (update.latencyMs !== undefined) entry.node.latencyMs = Math.max(0, update.latencyMs);
    if (update.status !== undefined) entry.node.status = update.status;
    if (update.gpuAvailable !== undefined) entry.node.gpuAvailable = update.gpuAvailable;

    this.touch();
    return materialize(entry);
  }

  updateAmbient(update: Partial<AmbientSignals>): void {
    this.ambient = {
      networkLatencyMs: update.networkLatencyMs ?? this.ambient.networkLatencyMs,
      costMultipliers: { ...this.ambient.costMultipliers, ...update.costMultipliers },
    };
    this.touch();
  }

  /**
   * Immutable point-in-time view of every node plus ambient signals.
   * Repeated calls with no mutation in between return identical snapshots.
   */
  snapshot(): MetricsSnapshot {
    if (this.cached && this.cached.version === this.version) {
      return this.cached;
    }
    const snapshot: MetricsSnapshot = deepFreeze({
      version: this.version,
      capturedAt: this.updatedAt,
      nodes: [...this.nodes.values()].map(materialize),
      ambient: {
        networkLatencyMs: this.ambient.networkLatencyMs,
        costMultipliers: { ...this.ambient.costMultipliers },
      },
    });
    this.cached = snapshot;
    return snapshot;
  }

  /**
   * Optimistically claim capacity on a node at dispatch time.
   * Throws CapacityExceededError instead of oversubscribing.
   */
  reserve(nodeId: string, delta: ResourceDelta): Reservation {
    const entry = this.entry(nodeId);
    validateDelta(nodeId, delta);
    const percent = deltaToPercent(entry.node, delta);
    const load = effectiveLoad(entry);

    if (load.cpuPercent + percent.cpuPercent > 100 + CAPACITY_EPSILON) {
      throw new CapacityExceededError(nodeId, "cpu", percent.cpuPercent, 100 - load.cpuPercent);
    }
    if (load.ramPercent + percent.ramPercent > 100 + CAPACITY_EPSILON) {
      throw new CapacityExceededError(nodeId, "ram", percent.ramPercent, 100 - load.ramPercent);
    }

    const reservation: Reservation = Object.freeze({
      nodeId,
      delta: Object.freeze({ cpuCores: delta.cpuCores, ramGb: delta.ramGb }),
      cpuPercent: percent.cpuPercent,
      ramPercent: percent.ramPercent,
    });
    entry.reservations.push(reservation);
    this.touch();
    return reservation;
  }

  /** Give back capacity claimed by reserve(); called on completion or failure. */
  release(nodeId: string, delta: ResourceDelta): void {
    const entry = this.entry(nodeId);
    validateDelta(nodeId, delta);
    const index = entry.reservations.findIndex(
      (r) => r.delta.cpuCores === delta.cpuCores && r.delta.ramGb === delta.ramGb,
    );

    if (index >= 0) {
      entry.reservations.splice(index, 1);
    } else {
      // Nothing outstanding matches: treat it as load leaving the node.
      const percent = deltaToPercent(entry.node, delta);
      entry.telemetry.cpuPercent = clampPercent(entry.telemetry.cpuPercent - percent.cpuPercent);
      entry.telemetry.ramPercent = clampPercent(entry.telemetry.ramPercent - percent.ramPercent);
      this.logger?.warn(
        `release on '${nodeId}' matched no outstanding reservation ` +
          `(cpu=${delta.cpuCores}, ram=${delta.ramGb}); subtracted from telemetry load`,
      );
    }
    this.touch();
  }

  get(nodeId: string): Readonly<NodeState> | undefined {
    const entry = this.nodes.get(nodeId);
    return entry ? materialize(entry) : undefined;
  }

  /** All nodes in registration order. */
  all(): Readonly<NodeState>[] {
    return [...this.nodes.values()].map(materialize);
  }

  /** Refuses while decisions still hold reservations on the node. */
  remove(nodeId: string): void {
    const entry = this.entry(nodeId);
    if (entry.reservations.length > 0) {
      throw new NodeInUseError(nodeId, entry.reservations.length);
    }
    this.nodes.delete(nodeId);
    this.touch();
  }

  size(): number {
    return this.nodes.size;
  }

  private entry(nodeId: string): NodeEntry {
    const entry = this.nodes.get(nodeId);
    if (!entry) {
      throw new UnknownNodeError(nodeId);
    }
    return entry;
  }

  private touch(): void {
    this.version += 1;
    this.updatedAt = this.clock().toISOString();
  }
}

function effectiveLoad(entry: NodeEntry): ResourceLoad {
  let cpuPercent = entry.telemetry.cpuPercent;
  let ramPercent = entry.telemetry.ramPercent;
  for (const reservation of entry.reservations) {
    cpuPercent += reservation.cpuPercent;
    ramPercent += reservation.ramPercent;
  }
  return { cpuPercent: clampPercent(cpuPercent), ramPercent: clampPercent(ramPercent) };
}

function materialize(entry: NodeEntry): NodeState {
  return {
    ...entry.node,
    capacity: { ...entry.node.capacity },
    cost: { ...entry.node.cost },
    ...(entry.node.tags !== undefined ? { tags: [...entry.node.tags] } : {}),
    load: effectiveLoad(entry),
    reservations: entry.reservations.length,
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
