import { headroom } from "@fleetroute/core";
import type {
    ExecutionOutcome,
    HistoryEntry,
    HistoryStatistics,
    NodeState,
    RoutingDecision,
} from "@fleetroute/core";

// Plain-text renderers. Commands add colour on top so these stay testable.

/** Left-aligned columns, two spaces apart, no trailing whitespace. */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
    const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
    const line = (cells: readonly string[]) =>
        widths
            .map((w, i) => (cells[i] ?? "").padEnd(w))
            .join("  ")
            .trimEnd();
    return [line(headers), ...rows.map(line)];
}

export const NODE_HEADERS = ["ID", "CATEGORY", "STATUS", "CPU", "RAM", "LATENCY", "COST", "GPU", "HEADROOM"] as const;

export function nodeCells(node: Readonly<NodeState>): string[] {
    return [
        node.id,
        node.category,
        node.status,
        `${node.load.cpuPercent.toFixed(1)}%`,
        `${node.load.ramPercent.toFixed(1)}%`,
        `${node.latencyMs.toFixed(1)}ms`,
        `${node.cost.amount}/${node.cost.unit}`,
        node.gpuAvailable ? "yes" : "no",
        `${Math.round(headroom(node) * 100)}%`,
    ];
}

export function formatNodeTable(nodes: readonly Readonly<NodeState>[]): string[] {
    return formatTable(NODE_HEADERS, nodes.map(nodeCells));
}

export function formatDecision(decision: RoutingDecision): string[] {
    const lines = [
        `${decision.taskId} → ${decision.nodeId} [${decision.category}]`,
        `  strategy    ${decision.strategy}` +
            (decision.degraded ? ` (degraded: ${decision.degradedReason ?? "classifier unavailable"})` : ""),
        `  confidence  ${decision.confidence.toFixed(3)}`,
        `  decisive    ${decision.decisiveDimension}`,
        `  scores      ${[...decision.scores].map(([id, s]) => `${id}=${s.toFixed(3)}`).join("  ")}`,
    ];
    for (const rejection of decision.rejected) {
        lines.push(`  rejected    ${rejection.nodeId}: ${rejection.reasons.map((r) => r.detail).join(", ")}`);
    }
    lines.push(`  rationale   ${decision.rationale}`);
    return lines;
}

export function formatOutcome(outcome: ExecutionOutcome): string {
    return outcome.success
        ? `  outcome     completed in ${outcome.latencyMs}ms, cost ${outcome.cost.toFixed(4)}`
        : `  outcome     failed: ${outcome.error ?? "unknown error"}`;
}

/** JSON-safe view of a decision (Map → object). */
export function decisionToJson(decision: RoutingDecision): Record<string, unknown> {
    return { ...decision, scores: Object.fromEntries(decision.scores) };
}

export const HISTORY_HEADERS = ["TIME", "TASK", "TYPE", "NODE", "STRATEGY", "CONF", "STATUS", "LATENCY", "COST"] as const;

export function formatHistory(entries: readonly HistoryEntry[]): string[] {
    return formatTable(
        HISTORY_HEADERS,
        entries.map((e) => [
            e.decidedAt,
            e.taskId,
            e.taskType,
            e.nodeId,
            e.degraded ? `${e.strategy}*` : e.strategy,
            e.confidence.toFixed(3),
            e.status,
            `${e.latencyMs}ms`,
            e.cost.toFixed(4),
        ]),
    );
}

export function formatStatistics(stats: HistoryStatistics): string[] {
    const { overall } = stats;
    return [
        ...formatTable(
            ["NODE", "TASKS", "AVG LATENCY", "TOTAL COST"],
            stats.nodes.map((n) => [n.nodeId, String(n.taskCount), `${n.avgLatencyMs}ms`, n.totalCost.toFixed(4)]),
        ),
        "",
        `Total tasks:     ${overall.totalTasks}`,
        `Successful:      ${overall.successfulTasks} (${(overall.successRate * 100).toFixed(1)}%)`,
        `Degraded:        ${overall.degradedDecisions}`,
    ];
}
