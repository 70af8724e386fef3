// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";

import {
  CapacityExceededError,
  DuplicateNodeError,
  InvalidNodeDataError,
  NodeInUseError,
  UnknownNodeError,
} from "../../src/exceptions.js";
import { NodeRegistry } from "../../src/registry/registry.js";
import { FIXED_TIME, makeRegistration, makeRegistry, spyLogger } from "./fixtures.js";

function edgeRegistry(cpuPercent = 25, ramPercent = 10) {
  return makeRegistry([makeRegistration("e1", "edge", { load: { cpuPercent, ramPercent }, latencyMs: 8 })]);
}

describe("NodeRegistry: registration", () => {
  it("registers a node with defaults", () => {
    const registry = edgeRegistry();
    const node = registry.get("e1");
    expect(node).toEqual({
      id: "e1",
      category: "edge",
      status: "active",
      capacity: { cpuCores: 4, ramGb: 8 },
      load: { cpuPercent: 25, ramPercent: 10 },
      latencyMs: 8,
      cost: { amount: 0.25, unit: "task" },
      gpuAvailable: false,
      reservations: 0,
    });
    expect(registry.size()).toBe(1);
  });

  it("rejects a duplicate id", () => {
    const registry = edgeRegistry();
    expect(() => registry.register(makeRegistration("e1", "cloud"))).toThrow(DuplicateNodeError);
  });

  it("lists nodes in registration order", () => {
    const registry = makeRegistry([
      makeRegistration("z", "edge"),
      makeRegistration("a", "cloud"),
      makeRegistration("m", "gpu"),
    ]);
    expect(registry.all().map((n) => n.id)).toEqual(["z", "a", "m"]);
  });

  it("removes nodes and rejects unknown ids", () => {
    const registry = edgeRegistry();
    registry.remove("e1");
    expect(registry.get("e1")).toBeUndefined();
    expect(() => registry.remove("e1")).toThrow(UnknownNodeError);
  });

  it("refuses to remove a node with outstanding reservations", () => {
    const registry = edgeRegistry();
    const delta = { cpuCores: 1, ramGb: 1 };
    registry.reserve("e1", delta);

    expect(() => registry.remove("e1")).toThrow(new NodeInUseError("e1", 1));
    expect(registry.get("e1")?.reservations).toBe(1);

    registry.release("e1", delta);
    registry.remove("e1");
    expect(registry.size()).toBe(0);
  });
});

describe("NodeRegistry: input validation", () => {
  function issuesOf(fn: () => unknown): string[] {
    try {
      fn();
    } catch (err) {
      if (err instanceof InvalidNodeDataError) return err.issues;
      throw err;
    }
    throw new Error("expected InvalidNodeDataError");
  }

  it("rejects a registration with zero capacity", () => {
    const registry = new NodeRegistry();
    const registration = makeRegistration("e1", "edge", { capacity: { cpuCores: 0, ramGb: 8 } });
    expect(issuesOf(() => registry.register(registration))).toEqual([
      "capacity.cpuCores: Number must be greater than 0",
    ]);
    expect(registry.size()).toBe(0);
  });

  it("rejects a NaN load at registration", () => {
    const registry = new NodeRegistry();
    expect(() =>
      registry.register(makeRegistration("e1", "edge", { load: { cpuPercent: Number.NaN } })),
    ).toThrow(new InvalidNodeDataError("e1", ["load.cpuPercent: Expected number, received nan"]));
  });

  it("rejects NaN telemetry and keeps the previous reading", () => {
    const registry = edgeRegistry();
    const version = registry.snapshot().version;

    expect(
      issuesOf(() =>
        registry.updateTelemetry("e1", { load: { mode: "absolute", cpuPercent: Number.NaN }, latencyMs: Number.NaN }),
      ),
    ).toEqual(["load.cpuPercent: Expected number, received nan", "latencyMs: Expected number, received nan"]);
    expect(registry.get("e1")?.load).toEqual({ cpuPercent: 25, ramPercent: 10 });
    expect(registry.get("e1")?.latencyMs).toBe(8);
    expect(registry.snapshot().version).toBe(version);
  });

  it("rejects a negative latency reading", () => {
    const registry = edgeRegistry();
    expect(issuesOf(() => registry.updateTelemetry("e1", { latencyMs: -1 }))).toEqual([
      "latencyMs: Number must be greater than or equal to 0",
    ]);
  });

  it("rejects negative or infinite reservation deltas", () => {
    const registry = edgeRegistry();
    expect(issuesOf(() => registry.reserve("e1", { cpuCores: -1, ramGb: Number.POSITIVE_INFINITY }))).toEqual([
      "cpuCores: Number must be greater than or equal to 0",
      "ramGb: Number must be finite",
    ]);
    expect(issuesOf(() => registry.release("e1", { cpuCores: Number.NaN, ramGb: 0 }))).toEqual([
      "cpuCores: Expected number, received nan",
    ]);
    expect(registry.get("e1")?.load).toEqual({ cpuPercent: 25, ramPercent: 10 });
  });
});

describe("NodeRegistry: telemetry", () => {
  it("applies absolute readings idempotently", () => {
    const registry = edgeRegistry();
    const update = { load: { mode: "absolute" as const, cpuPercent: 40 } };
    registry.updateTelemetry("e1", update);
    registry.updateTelemetry("e1", update);
    expect(registry.get("e1")?.load).toEqual({ cpuPercent: 40, ramPercent: 10 });
  });

  it("clamps delta readings to 0–100", () => {
    const registry = edgeRegistry();
    registry.updateTelemetry("e1", { load: { mode: "delta", cpuPercent: 95 } });
    expect(registry.get("e1")?.load.cpuPercent).toBe(100);
    registry.updateTelemetry("e1", { load: { mode: "delta", cpuPercent: -250, ramPercent: -20 } });
    expect(registry.get("e1")?.load).toEqual({ cpuPercent: 0, ramPercent: 0 });
  });

  it("updates latency, status and GPU availability", () => {
    const registry = edgeRegistry();
    registry.updateTelemetry("e1", { latencyMs: 33, status: "degraded", gpuAvailable: true });
    const node = registry.get("e1");
    expect(node?.latencyMs).toBe(33);
    expect(node?.status).toBe("degraded");
    expect(node?.gpuAvailable).toBe(true);
  });

  it("throws UnknownNodeError for telemetry on an unregistered node", () => {
    const registry = edgeRegistry();
    expect(() => registry.updateTelemetry("ghost", { latencyMs: 1 })).toThrow("Unknown node 'ghost'");
  });
});

describe("NodeRegistry: snapshot", () => {
  it("returns the identical snapshot when nothing changed", () => {
    const registry = edgeRegistry();
    const first = registry.snapshot();
    const second = registry.snapshot();
    expect(second).toBe(first);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it("is deeply frozen", () => {
    const snapshot = edgeRegistry().snapshot();
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.nodes)).toBe(true);
    expect(Object.isFrozen(snapshot.nodes[0])).toBe(true);
    expect(Object.isFrozen(snapshot.nodes[0]?.load)).toBe(true);
    expect(Object.isFrozen(snapshot.ambient.costMultipliers)).toBe(true);
  });

  it("is unaffected by later mutations", () => {
    const registry = edgeRegistry();
    const before = registry.snapshot();
    registry.updateTelemetry("e1", { load: { mode: "absolute", cpuPercent: 90 } });
    const after = registry.snapshot();

    expect(before.nodes[0]?.load.cpuPercent).toBe(25);
    expect(after.nodes[0]?.load.cpuPercent).toBe(90);
    expect(after.version).toBe(before.version + 1);
  });

  it("stamps the time of the last mutation", () => {
    const snapshot = edgeRegistry().snapshot();
    expect(snapshot.capturedAt).toBe(FIXED_TIME);
    expect(snapshot.version).toBe(1);
  });

  it("carries ambient signals and bumps the version on ambient updates", () => {
    const registry = new NodeRegistry({ ambient: { networkLatencyMs: 120 } });
    const before = registry.snapshot();
    expect(before.ambient).toEqual({ networkLatencyMs: 120, costMultipliers: { edge: 1, cloud: 2.5, gpu: 5 } });

    registry.updateAmbient({ costMultipliers: { edge: 1, cloud: 3, gpu: 6 } });
    const after = registry.snapshot();
    expect(after.ambient.costMultipliers.cloud).toBe(3);
    expect(after.ambient.networkLatencyMs).toBe(120);
    expect(after.version).toBe(before.version + 1);
  });
});

describe("NodeRegistry: reservations", () => {
  it("adds reserved capacity to the effective load", () => {
    const registry = edgeRegistry();
    const reservation = registry.reserve("e1", { cpuCores: 1, ramGb: 2 });

    expect(reservation).toEqual({
      nodeId: "e1",
      delta: { cpuCores: 1, ramGb: 2 },
      cpuPercent: 25,
      ramPercent: 25,
    });
    expect(registry.get("e1")?.load).toEqual({ cpuPercent: 50, ramPercent: 35 });
    expect(registry.get("e1")?.reservations).toBe(1);
  });

  it("converts cores and gigabytes against the node's own capacity", () => {
    const registry = makeRegistry([makeRegistration("c1", "cloud", { capacity: { cpuCores: 16, ramGb: 64 } })]);
    const reservation = registry.reserve("c1", { cpuCores: 2, ramGb: 8 });

    expect(reservation.cpuPercent).toBe(12.5);
    expect(reservation.ramPercent).toBe(12.5);
    expect(registry.get("c1")?.load).toEqual({ cpuPercent: 12.5, ramPercent: 12.5 });

    registry.release("c1", { cpuCores: 2, ramGb: 8 });
    expect(registry.get("c1")?.load).toEqual({ cpuPercent: 0, ramPercent: 0 });
  });

  it("restores the exact previous load on release", () => {
    const registry = makeRegistry([
      makeRegistration("e1", "edge", {
        capacity: { cpuCores: 3, ramGb: 7 },
        load: { cpuPercent: 33.3, ramPercent: 12.7 },
      }),
    ]);
    const before = registry.get("e1")?.load;
    const delta = { cpuCores: 0.7, ramGb: 1.3 };

    registry.reserve("e1", delta);
    registry.release("e1", delta);

    expect(registry.get("e1")?.load).toEqual(before);
    expect(registry.get("e1")?.reservations).toBe(0);
  });

  it("refuses to oversubscribe CPU", () => {
    const registry = edgeRegistry(90, 0);
    let error: unknown;
    try {
      registry.reserve("e1", { cpuCores: 1, ramGb: 0 });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(CapacityExceededError);
    expect(error).toMatchObject({ nodeId: "e1", resource: "cpu", requestedPercent: 25, availablePercent: 10 });
    expect(registry.get("e1")?.reservations).toBe(0);
  });

  it("refuses to oversubscribe RAM", () => {
    const registry = edgeRegistry(0, 80);
    expect(() => registry.reserve("e1", { cpuCores: 0, ramGb: 4 })).toThrow(
      "Reservation on 'e1' exceeds ram capacity: requested 50.0%, available 20.0%",
    );
  });

  it("lets only one of two decisions spend the last spare capacity", () => {
    const registry = edgeRegistry(50, 0);
    const demand = { cpuCores: 2, ramGb: 0 };

    registry.reserve("e1", demand);
    expect(() => registry.reserve("e1", demand)).toThrow(CapacityExceededError);
    expect(registry.get("e1")?.load.cpuPercent).toBe(100);
  });

  it("treats an unmatched release as load leaving the node and warns", () => {
    const logger = spyLogger();
    const registry = makeRegistry(
      [makeRegistration("e1", "edge", { load: { cpuPercent: 50, ramPercent: 50 } })],
      { logger },
    );

    registry.release("e1", { cpuCores: 1, ramGb: 2 });

    expect(registry.get("e1")?.load).toEqual({ cpuPercent: 25, ramPercent: 25 });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("throws UnknownNodeError when reserving on an unknown node", () => {
    const registry = edgeRegistry();
    expect(() => registry.reserve("ghost", { cpuCores: 1, ramGb: 1 })).toThrow(UnknownNodeError);
  });
});
