/**
 * build command - Build one scenario's images, or every service
 */

import chalk from "chalk";
import type { ConfigPaths, DeployConfig } from "../lib/config.js";
import type { RunOptions } from "../lib/runner.js";
import { runTargets } from "../lib/runner.js";
import { scenarioCommand } from "./scenario.js";

export function buildCommand(
  config: DeployConfig,
  paths: ConfigPaths,
  scenario?: string,
  autopilot?: string,
  options: RunOptions = {}
): void {
  if (!scenario) {
    // Builds overlapping services such as px4 and ardupilot alike
    runTargets(["build"], config, paths, options);
    return;
  }

  if (!autopilot) {
    console.error(chalk.red(`Specify an autopilot for '${scenario}', e.g. 'build ${scenario} px4'.`));
    process.exit(1);
  }

  scenarioCommand("build", config, paths, scenario, autopilot, options);
}
