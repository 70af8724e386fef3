// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { parseConfig } from "../../src/config/config.js";
import { DecisionEngine } from "../../src/engine/engine.js";
import { SqliteDecisionStore } from "../../src/history/store.js";
import { EQUAL_WEIGHTS, FIXED_TIME, fixedClock, makeRecord, makeTask, routingTask, twoNodeRegistry } from "./fixtures.js";

describe("SqliteDecisionStore", () => {
  let store: SqliteDecisionStore;

  beforeEach(() => {
    store = new SqliteDecisionStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  function seed(): void {
    store.record(makeRecord("e1", "completed", { latencyMs: 40, cost: 0.004 }, { taskId: "a" }));
    store.record(
      makeRecord("c1", "failed", { latencyMs: 250, cost: 0.025, error: "timeout" }, { taskId: "b", degraded: true }),
    );
    store.record(makeRecord("e1", "completed", { latencyMs: 60, cost: 0.006 }, { taskId: "c" }));
  }

  it("starts empty", () => {
    expect(store.history()).toEqual([]);
    expect(store.statistics()).toEqual({
      nodes: [],
      overall: { totalTasks: 0, successfulTasks: 0, successRate: 0, degradedDecisions: 0 },
    });
  });

  it("returns the newest decisions first", () => {
    seed();
    expect(store.history().map((e) => e.taskId)).toEqual(["c", "b", "a"]);
    expect(store.history({ limit: 1 }).map((e) => e.taskId)).toEqual(["c"]);
    expect(store.history({ nodeId: "e1" }).map((e) => e.taskId)).toEqual(["c", "a"]);
  });

  it("stores the decision and its outcome", () => {
    seed();
    const [entry] = store.history({ nodeId: "c1" });
    expect(entry).toEqual({
      taskId: "b",
      taskType: "generic",
      priority: 5,
      nodeId: "c1",
      category: "edge",
      confidence: 0.75,
      strategy: "heuristic",
      degraded: true,
      decisiveDimension: "cost",
      status: "failed",
      latencyMs: 250,
      cost: 0.025,
      error: "timeout",
      rationale: "Routed 'generic' task t-1 to e1 [edge]",
      decidedAt: FIXED_TIME,
    });
  });

  it("never stores the task payload", () => {
    const record = makeRecord("e1", "completed", { latencyMs: 1, cost: 0 });
    store.record({ ...record, task: makeTask({ id: "secret", payload: { token: "test-secret" } }) });
    const [entry] = store.history();
    expect(entry?.taskId).toBe("secret");
    expect(JSON.stringify(entry).includes("test-secret")).toBe(false);
  });

  it("aggregates per node and overall", () => {
    seed();
    expect(store.statistics()).toEqual({
      nodes: [
        { nodeId: "c1", taskCount: 1, avgLatencyMs: 250, totalCost: 0.025 },
        { nodeId: "e1", taskCount: 2, avgLatencyMs: 50, totalCost: 0.01 },
      ],
      overall: { totalTasks: 3, successfulTasks: 2, successRate: 0.667, degradedDecisions: 1 },
    });
  });

  it("receives settled decisions from the engine", () => {
    const engine = new DecisionEngine({
      registry: twoNodeRegistry(),
      config: parseConfig({ heuristic: { weights: EQUAL_WEIGHTS } }),
      sink: store,
      clock: fixedClock(),
    });
    engine.decide(routingTask({ id: "live" })).complete({ success: true, latencyMs: 42, cost: 0.01 });

    const [entry] = store.history();
    expect(entry?.taskId).toBe("live");
    expect(entry?.nodeId).toBe("e1");
    expect(entry?.status).toBe("completed");
    expect(entry?.confidence).toBe(0.75);
    expect(entry?.decisiveDimension).toBe("cost");
  });
});
