import { describe, it, expect } from "vitest";
import type { HistoryEntry, NodeState, RoutingDecision } from "@fleetroute/core";

import {
    decisionToJson,
    formatDecision,
    formatHistory,
    formatNodeTable,
    formatOutcome,
    formatStatistics,
    formatTable,
} from "../../src/format.js";

const NODE: NodeState = {
    id: "e1",
    category: "edge",
    status: "active",
    capacity: { cpuCores: 4, ramGb: 8 },
    load: { cpuPercent: 25, ramPercent: 25 },
    latencyMs: 50,
    cost: { amount: 0.25, unit: "task" },
    gpuAvailable: false,
    reservations: 0,
};

const DECISION: RoutingDecision = {
    taskId: "t-1",
    nodeId: "e1",
    category: "edge",
    confidence: 0.75,
    scores: new Map([
        ["e1", 0.75],
        ["c1", 0.5],
    ]),
    strategy: "heuristic",
    degraded: false,
    decisiveDimension: "cost",
    rationale: "Routed 'generic' task t-1 to e1 [edge] with score 0.750 via heuristic scoring.",
    rejected: [{ nodeId: "g1", reasons: [{ constraint: "gpu", detail: "GPU unavailable" }] }],
    snapshotVersion: 2,
    timestamp: "2026-03-01T12:00:00.000Z",
};

describe("formatTable", () => {
    it("pads columns to the widest cell and trims line ends", () => {
        expect(formatTable(["A", "LONG"], [["xyz", "1"], ["q", ""]])).toEqual(["A    LONG", "xyz  1", "q"]);
    });
});

describe("formatNodeTable", () => {
    it("renders load, latency, cost and headroom", () => {
        expect(formatNodeTable([NODE])).toEqual([
            "ID  CATEGORY  STATUS  CPU    RAM    LATENCY  COST       GPU  HEADROOM",
            "e1  edge      active  25.0%  25.0%  50.0ms   0.25/task  no   75%",
        ]);
    });
});

describe("formatDecision", () => {
    it("lists scores, rejections and the rationale", () => {
        expect(formatDecision(DECISION)).toEqual([
            "t-1 → e1 [edge]",
            "  strategy    heuristic",
            "  confidence  0.750",
            "  decisive    cost",
            "  scores      e1=0.750  c1=0.500",
            "  rejected    g1: GPU unavailable",
            "  rationale   Routed 'generic' task t-1 to e1 [edge] with score 0.750 via heuristic scoring.",
        ]);
    });

    it("flags degraded decisions", () => {
        const lines = formatDecision({ ...DECISION, degraded: true, degradedReason: "no classifier artifact configured" });
        expect(lines[1]).toBe("  strategy    heuristic (degraded: no classifier artifact configured)");
    });
});

describe("formatOutcome", () => {
    it("describes success and failure", () => {
        expect(formatOutcome({ success: true, latencyMs: 60, cost: 0.006 })).toBe(
            "  outcome     completed in 60ms, cost 0.0060",
        );
        expect(formatOutcome({ success: false, latencyMs: 0, cost: 0, error: "boom" })).toBe("  outcome     failed: boom");
        expect(formatOutcome({ success: false, latencyMs: 0, cost: 0 })).toBe("  outcome     failed: unknown error");
    });
});

describe("decisionToJson", () => {
    it("turns the score map into an object", () => {
        const json = decisionToJson(DECISION);
        expect(json["scores"]).toEqual({ e1: 0.75, c1: 0.5 });
        expect(JSON.parse(JSON.stringify(json))).toHaveProperty("nodeId", "e1");
    });
});

describe("formatHistory", () => {
    it("marks degraded decisions with an asterisk", () => {
        const entry: HistoryEntry = {
            taskId: "a",
            taskType: "generic",
            priority: 5,
            nodeId: "c1",
            category: "cloud",
            confidence: 0.75,
            strategy: "heuristic",
            degraded: true,
            decisiveDimension: "cost",
            status: "failed",
            latencyMs: 250,
            cost: 0.025,
            error: "timeout",
            rationale: "",
            decidedAt: "2026-03-01T12:00:00.000Z",
        };
        expect(formatHistory([entry])[1]).toBe(
            "2026-03-01T12:00:00.000Z  a     generic  c1    heuristic*  0.750  failed  250ms    0.0250",
        );
    });
});

describe("formatStatistics", () => {
    it("renders per-node rows and the overall summary", () => {
        expect(
            formatStatistics({
                nodes: [
                    { nodeId: "c1", taskCount: 1, avgLatencyMs: 250, totalCost: 0.025 },
                    { nodeId: "e1", taskCount: 2, avgLatencyMs: 50, totalCost: 0.01 },
                ],
                overall: { totalTasks: 3, successfulTasks: 2, successRate: 0.667, degradedDecisions: 1 },
            }),
        ).toEqual([
            "NODE  TASKS  AVG LATENCY  TOTAL COST",
            "c1    1      250ms        0.0250",
            "e1    2      50ms         0.0100",
            "",
            "Total tasks:     3",
            "Successful:      2 (66.7%)",
            "Degraded:        1",
        ]);
    });
});
