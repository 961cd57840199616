/**
 * stop command - Stop containers without removing them
 */

import chalk from "chalk";
import type { ConfigPaths, DeployConfig } from "../lib/config.js";
import type { RunOptions } from "../lib/runner.js";
import { runTargets } from "../lib/runner.js";

export function stopCommand(config: DeployConfig, paths: ConfigPaths, options: RunOptions = {}): void {
  runTargets(["stop"], config, paths, options);
  if (!options.dryRun) {
    console.log(chalk.green("Containers stopped."));
  }
}
