/**
 * down command - Stop and remove every container in the project
 */

import chalk from "chalk";
import type { ConfigPaths, DeployConfig } from "../lib/config.js";
import type { RunOptions } from "../lib/runner.js";
import { runTargets } from "../lib/runner.js";

export function downCommand(config: DeployConfig, paths: ConfigPaths, options: RunOptions = {}): void {
  runTargets(["down"], config, paths, options);
  if (!options.dryRun) {
    console.log(chalk.green("Containers removed."));
  }
}
