/**
 * create command - Create (and build if needed) a scenario's containers
 */

import type { ConfigPaths, DeployConfig } from "../lib/config.js";
import type { RunOptions } from "../lib/runner.js";
import { scenarioCommand } from "./scenario.js";

export function createCommand(
  config: DeployConfig,
  paths: ConfigPaths,
  scenario: string,
  autopilot: string,
  options: RunOptions = {}
): void {
  scenarioCommand("create", config, paths, scenario, autopilot, options);
}
