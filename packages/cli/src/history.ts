import { Command } from "commander";
import chalk from "chalk";

import { formatHistory } from "./format.js";
import { parseNumber } from "./route.js";
import { openStore } from "./runtime.js";

interface HistoryOptions {
    config?: string;
    limit: number;
    node?: string;
}

export const historyCommand = new Command("history")
    .description("Recent routing decisions, newest first")
    .option("--limit <n>", "Rows to show", parseNumber, 20)
    .option("--node <id>", "Only decisions routed to this node")
    .option("--config <path>", "Config file")
    .action((options: HistoryOptions) => {
        const store = openStore(options);
        try {
            const entries = store.history({ limit: options.limit, ...(options.node ? { nodeId: options.node } : {}) });
            if (entries.length === 0) {
                console.log(chalk.yellow("No decisions recorded yet."));
                return;
            }
            const [header, ...rows] = formatHistory(entries);
            console.log(chalk.bold(header));
            for (const row of rows) console.log(row);
            if (entries.some((e) => e.degraded)) {
                console.log(chalk.gray("\n* decided in degraded mode (heuristic fallback)"));
            }
        } finally {
            store.close();
        }
    });
