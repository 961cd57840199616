/**
 * run command - Run catalog targets by name, e.g. up-offboard-sitl-dev-px4
 */

import type { ConfigPaths, DeployConfig } from "../lib/config.js";
import type { RunOptions } from "../lib/runner.js";
import { runTargets } from "../lib/runner.js";

export function runCommand(
  config: DeployConfig,
  paths: ConfigPaths,
  targets: string[],
  options: RunOptions = {}
): void {
  runTargets(targets, config, paths, options);
}
