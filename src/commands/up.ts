/**
 * up command - Create and start a scenario's containers in the background
 */

import type { ConfigPaths, DeployConfig } from "../lib/config.js";
import type { RunOptions } from "../lib/runner.js";
import { scenarioCommand } from "./scenario.js";

export function upCommand(
  config: DeployConfig,
  paths: ConfigPaths,
  scenario: string,
  autopilot: string,
  options: RunOptions = {}
): void {
  scenarioCommand("up", config, paths, scenario, autopilot, options);
}
