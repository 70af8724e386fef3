#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { VERSION } from "@fleetroute/core";

import { historyCommand } from "./history.js";
import { nodesCommand } from "./nodes.js";
import { routeCommand } from "./route.js";
import { simulateCommand } from "./simulate.js";
import { statsCommand } from "./stats.js";

const program = new Command();

program
    .name("fleetroute")
    .description("Route workloads across edge, cloud and GPU nodes")
    .version(VERSION);

program.addCommand(routeCommand);
program.addCommand(nodesCommand);
program.addCommand(historyCommand);
program.addCommand(statsCommand);
program.addCommand(simulateCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`\nFatal error: ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
});
