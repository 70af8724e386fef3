import { Command } from "commander";
import chalk from "chalk";
import { loadConfig, registryFromConfig } from "@fleetroute/core";

import { formatNodeTable } from "./format.js";

interface NodesOptions {
    config?: string;
    category?: string;
}

export const nodesCommand = new Command("nodes")
    .description("Show the configured fleet and its current load")
    .option("--category <category>", "Only edge, cloud or gpu nodes")
    .option("--config <path>", "Config file")
    .action((options: NodesOptions) => {
        const config = loadConfig(options.config);
        const nodes = registryFromConfig(config)
            .all()
            .filter((n) => !options.category || n.category === options.category);

        if (nodes.length === 0) {
            console.log(chalk.yellow("No nodes configured."));
            return;
        }
        const [header, ...rows] = formatNodeTable(nodes);
        console.log(chalk.bold(header));
        for (const row of rows) console.log(row);
        console.log(chalk.gray(`\n${nodes.length} node(s)`));
    });
