import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { SimulatedExecutor } from "@fleetroute/core";

import { decisionToJson, formatDecision, formatOutcome } from "./format.js";
import { createRuntime } from "./runtime.js";
import type { RuntimeOptions } from "./runtime.js";

export interface RouteOptions extends RuntimeOptions {
    task?: string;
    id?: string;
    type: string;
    priority: number;
    maxLatency?: number;
    latencySensitivity?: number;
    cpu?: number;
    ram?: number;
    gpu?: boolean;
    costSensitivity?: number;
    dryRun?: boolean;
    json?: boolean;
}

export function parseNumber(value: string): number {
    const n = Number(value);
    if (value.trim() === "" || !Number.isFinite(n)) {
        throw new InvalidArgumentError(`'${value}' is not a number.`);
    }
    return n;
}

/** Raw task record from --task JSON or the individual flags; validation happens in the engine. */
export function buildTaskInput(options: RouteOptions, newId: () => string = () => `task-${Date.now()}`): unknown {
    if (options.task !== undefined) {
        const raw: unknown = JSON.parse(options.task);
        return raw;
    }
    return {
        id: options.id ?? newId(),
        taskType: options.type,
        priority: options.priority,
        requiresGpu: options.gpu ?? false,
        ...(options.maxLatency !== undefined ? { maxLatencyMs: options.maxLatency } : {}),
        ...(options.latencySensitivity !== undefined ? { latencySensitivity: options.latencySensitivity } : {}),
        ...(options.cpu !== undefined ? { requiredCpuCores: options.cpu } : {}),
        ...(options.ram !== undefined ? { requiredRamGb: options.ram } : {}),
        ...(options.costSensitivity !== undefined ? { costSensitivity: options.costSensitivity } : {}),
    };
}

export const routeCommand = new Command("route")
    .description("Route one task across the configured fleet and run it on the simulated executor")
    .option("--task <json>", "Full task record as JSON (overrides the task flags)")
    .option("--id <id>", "Task id")
    .option("--type <type>", "Task type", "generic")
    .option("--priority <n>", "Priority 1-10", parseNumber, 5)
    .option("--max-latency <ms>", "Hard latency ceiling in ms", parseNumber)
    .option("--latency-sensitivity <n>", "Latency sensitivity 1-10", parseNumber)
    .option("--cpu <cores>", "Required CPU cores", parseNumber)
    .option("--ram <gb>", "Required RAM in GB", parseNumber)
    .option("--gpu", "Task requires a GPU")
    .option("--cost-sensitivity <n>", "Cost sensitivity 1-10", parseNumber)
    .option("--strategy <name>", "heuristic | classifier | blended")
    .option("--model <path>", "Classifier artifact (JSON)")
    .option("--config <path>", "Config file")
    .option("--dry-run", "Decide only; release the reservation without executing")
    .option("--no-history", "Do not record the decision")
    .option("--json", "Print the decision as JSON")
    .option("-v, --verbose", "Debug logging")
    .action(async (options: RouteOptions) => {
        const runtime = createRuntime({ ...options, history: options.history !== false && !options.dryRun });
        try {
            const input = buildTaskInput(options);

            if (options.dryRun) {
                const handle = runtime.engine.decide(input);
                handle.cancel("dry run");
                if (options.json) {
                    console.log(JSON.stringify(decisionToJson(handle.decision), null, 2));
                } else {
                    printDecision(formatDecision(handle.decision));
                }
                return;
            }

            const report = await runtime.engine.execute(input, new SimulatedExecutor());
            if (options.json) {
                console.log(
                    JSON.stringify(
                        { decision: decisionToJson(report.decision), outcome: report.outcome, finalState: report.finalState },
                        null,
                        2,
                    ),
                );
            } else {
                printDecision(formatDecision(report.decision));
                const line = formatOutcome(report.outcome);
                console.log(report.outcome.success ? chalk.green(line) : chalk.red(line));
            }
        } finally {
            runtime.close();
        }
    });

function printDecision(lines: string[]): void {
    const [head, ...rest] = lines;
    if (head !== undefined) console.log(chalk.bold.green(`✓ ${head}`));
    for (const line of rest) console.log(chalk.gray(line));
}
