/**
 * Sequential execution of planned steps
 */

import chalk from "chalk";
import type { ConfigPaths, DeployConfig } from "./config.js";
import { composeDir } from "./config.js";
import { composeCommandLine, dockerCompose } from "./docker.js";
import type { PlanStep } from "./targets.js";
import { planTargets } from "./targets.js";
import { exposeXhost } from "./xhost.js";

export interface RunOptions {
  dryRun?: boolean;
}

/**
 * Run steps one by one. The first failing command throws and the remaining
 * steps are skipped; nothing already done is undone.
 */
export function executePlan(
  steps: readonly PlanStep[],
  config: DeployConfig,
  paths: ConfigPaths,
  options: RunOptions = {}
): void {
  const cwd = composeDir(config, paths);

  for (const step of steps) {
    switch (step.kind) {
      case "compose":
        if (options.dryRun) {
          console.log(composeCommandLine(step.args));
          break;
        }
        console.log(chalk.green(`=== ${step.target} ===`));
        dockerCompose(step.args, { cwd });
        break;
      case "expose-xhost":
        if (options.dryRun) {
          console.log(`xhost +local:<hostname> for ${config.gui_services.join(" ")}`);
          break;
        }
        console.log(chalk.green(`=== ${step.target} ===`));
        exposeXhost(config);
        break;
      case "message":
        console.log(step.message);
        break;
    }
  }
}

/**
 * Plan and run targets by name
 */
export function runTargets(
  names: readonly string[],
  config: DeployConfig,
  paths: ConfigPaths,
  options: RunOptions = {}
): void {
  executePlan(planTargets(names, config), config, paths, options);
}
