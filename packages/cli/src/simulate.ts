import { Command } from "commander";
import chalk from "chalk";
import {
    CapacityExceededError,
    NoEligibleNodeError,
    SimulatedExecutor,
    TelemetrySimulator,
    createRng,
    randomTask,
} from "@fleetroute/core";
import type { DecisionEngine, ExecutionReport, Rng } from "@fleetroute/core";

import { parseNumber } from "./route.js";
import { createRuntime } from "./runtime.js";
import type { RuntimeOptions } from "./runtime.js";

interface SimulateOptions extends RuntimeOptions {
    tasks: number;
    seed?: number;
    failureRate: number;
}

export interface SimulationSummary {
    routed: number;
    unroutable: number;
    completed: number;
    degraded: number;
    perNode: Map<string, number>;
}

/**
 * Route `count` synthetic tasks, advancing telemetry one tick before each.
 * Tasks nothing can take are counted, not thrown.
 */
export async function runSimulation(
    engine: DecisionEngine,
    simulator: TelemetrySimulator,
    executor: SimulatedExecutor,
    rng: Rng,
    count: number,
    onReport: (report: ExecutionReport) => void = () => {},
): Promise<SimulationSummary> {
    const summary: SimulationSummary = { routed: 0, unroutable: 0, completed: 0, degraded: 0, perNode: new Map() };

    for (let i = 1; i <= count; i++) {
        simulator.tick();
        const task = randomTask(rng, `sim-${String(i).padStart(4, "0")}`);
        let report: ExecutionReport;
        try {
            report = await engine.execute(task, executor);
        } catch (err) {
            if (err instanceof NoEligibleNodeError || err instanceof CapacityExceededError) {
                summary.unroutable += 1;
                continue;
            }
            throw err;
        }
        summary.routed += 1;
        if (report.finalState === "completed") summary.completed += 1;
        if (report.decision.degraded) summary.degraded += 1;
        summary.perNode.set(report.decision.nodeId, (summary.perNode.get(report.decision.nodeId) ?? 0) + 1);
        onReport(report);
    }
    return summary;
}

export const simulateCommand = new Command("simulate")
    .description("Drive the engine with simulated telemetry and a synthetic task mix")
    .option("--tasks <n>", "Number of tasks", parseNumber, 20)
    .option("--seed <n>", "Seed for a reproducible run", parseNumber)
    .option("--failure-rate <p>", "Simulated execution failure probability", parseNumber, 0.05)
    .option("--strategy <name>", "heuristic | classifier | blended")
    .option("--model <path>", "Classifier artifact (JSON)")
    .option("--config <path>", "Config file")
    .option("--no-history", "Do not record decisions")
    .option("-v, --verbose", "Debug logging")
    .action(async (options: SimulateOptions) => {
        const runtime = createRuntime(options);
        const rng = options.seed !== undefined ? createRng(options.seed) : Math.random;
        const simulator = new TelemetrySimulator(runtime.registry, {
            intervalMs: runtime.config.simulator.intervalMs,
            spikeProbability: runtime.config.simulator.spikeProbability,
            baseNetworkLatencyMs: runtime.config.ambient.networkLatencyMs,
            rng,
            logger: runtime.logger,
        });
        const executor = new SimulatedExecutor({ rng, failureRate: options.failureRate, realtime: false });

        console.log(
            chalk.blue(`[FleetRoute] Simulating ${options.tasks} task(s) with ${runtime.engine.strategyName} scoring`),
        );
        if (runtime.engine.degraded) {
            console.log(chalk.yellow("[FleetRoute] Classifier unavailable: running heuristic-only"));
        }

        try {
            const summary = await runSimulation(runtime.engine, simulator, executor, rng, options.tasks, (report) => {
                const { decision, outcome } = report;
                const mark = outcome.success ? chalk.green("✓") : chalk.red("✗");
                console.log(
                    `${mark} ${decision.taskId} → ${decision.nodeId.padEnd(16)} ` +
                        `${decision.confidence.toFixed(3)}  ${decision.decisiveDimension}`,
                );
            });

            console.log(chalk.bold("\nSummary"));
            console.log(`  routed      ${summary.routed}`);
            console.log(`  completed   ${summary.completed}`);
            console.log(`  unroutable  ${summary.unroutable}`);
            console.log(`  degraded    ${summary.degraded}`);
            for (const [nodeId, n] of [...summary.perNode].sort(([a], [b]) => a.localeCompare(b))) {
                console.log(chalk.gray(`  ${nodeId.padEnd(16)} ${n}`));
            }
        } finally {
            runtime.close();
        }
    });
