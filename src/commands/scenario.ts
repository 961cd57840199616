/**
 * Shared handling for create/build/up commands on a scenario
 */

import chalk from "chalk";
import type { TargetAction } from "../lib/catalog.js";
import { SCENARIOS, MIDDLEWARE, findMiddleware, findScenario, isAutopilot } from "../lib/catalog.js";
import type { ConfigPaths, DeployConfig } from "../lib/config.js";
import { unsupportedAutopilotMessage } from "../lib/middleware.js";
import type { RunOptions } from "../lib/runner.js";
import { runTargets } from "../lib/runner.js";
import { targetName } from "../lib/targets.js";

export function scenarioCommand(
  action: TargetAction,
  config: DeployConfig,
  paths: ConfigPaths,
  scenario: string,
  autopilot: string,
  options: RunOptions = {}
): void {
  const isScenario = findScenario(scenario) !== undefined;

  if (!isScenario && !findMiddleware(scenario)) {
    console.error(chalk.red(`Unknown scenario '${scenario}'.`));
    console.error(chalk.dim(`Available: ${[...SCENARIOS, ...MIDDLEWARE].map((s) => s.prefix).join(", ")}`));
    process.exit(1);
  }

  // Middleware targets report unsupported autopilots themselves
  if (isScenario && !isAutopilot(autopilot)) {
    console.error(chalk.red(unsupportedAutopilotMessage(autopilot)));
    process.exit(1);
  }

  runTargets([targetName(action, scenario, autopilot)], config, paths, options);
}
