/**
 * expose-xhost command - Grant X server access to GUI containers
 */

import chalk from "chalk";
import type { ConfigPaths, DeployConfig } from "../lib/config.js";
import type { RunOptions } from "../lib/runner.js";
import { runTargets } from "../lib/runner.js";
import { EXPOSE_XHOST_TARGET } from "../lib/targets.js";

export function exposeXhostCommand(config: DeployConfig, paths: ConfigPaths, options: RunOptions = {}): void {
  if (!process.env.DISPLAY && !options.dryRun) {
    console.warn(chalk.yellow("Warning: DISPLAY is not set, GUI containers may not be able to connect"));
  }
  runTargets([EXPOSE_XHOST_TARGET], config, paths, options);
}
