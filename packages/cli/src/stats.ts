import { Command } from "commander";
import chalk from "chalk";

import { formatStatistics } from "./format.js";
import { openStore } from "./runtime.js";

export const statsCommand = new Command("stats")
    .description("Per-node and overall routing statistics")
    .option("--config <path>", "Config file")
    .action((options: { config?: string }) => {
        const store = openStore(options);
        try {
            const stats = store.statistics();
            if (stats.overall.totalTasks === 0) {
                console.log(chalk.yellow("No decisions recorded yet."));
                return;
            }
            console.log(chalk.magenta("[FleetRoute] Routing statistics\n"));
            for (const line of formatStatistics(stats)) console.log(line);
        } finally {
            store.close();
        }
    });
