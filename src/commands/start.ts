/**
 * start command - Start existing containers
 */

import chalk from "chalk";
import type { ConfigPaths, DeployConfig } from "../lib/config.js";
import type { RunOptions } from "../lib/runner.js";
import { runTargets } from "../lib/runner.js";

export function startCommand(config: DeployConfig, paths: ConfigPaths, options: RunOptions = {}): void {
  runTargets(["start"], config, paths, options);
  if (!options.dryRun) {
    console.log(chalk.green("Containers started."));
  }
}
