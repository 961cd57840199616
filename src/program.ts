/**
 * Command definitions for the gisnav-deploy CLI
 */

import { Command } from "commander";
import chalk from "chalk";
import type { ConfigPaths, DeployConfig } from "./lib/config.js";
import { loadConfig, resolveConfigPaths } from "./lib/config.js";
import { requireDocker } from "./lib/docker.js";
import type { RunOptions } from "./lib/runner.js";
import { UnknownTargetError } from "./lib/targets.js";
import { printValidationErrors } from "./lib/validate.js";
import { buildCommand } from "./commands/build.js";
import { createCommand } from "./commands/create.js";
import { demoCommand } from "./commands/demo.js";
import { downCommand } from "./commands/down.js";
import { exposeXhostCommand } from "./commands/expose-xhost.js";
import { initCommand } from "./commands/init.js";
import { listCommand } from "./commands/list.js";
import { runCommand } from "./commands/run.js";
import { startCommand } from "./commands/start.js";
import { stopCommand } from "./commands/stop.js";
import { upCommand } from "./commands/up.js";

interface GlobalOptions {
  config?: string;
  dryRun?: boolean;
}

/**
 * Exit status of a failed child process, if the error carries one
 */
export function exitStatusOf(err: unknown): number | undefined {
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/**
 * Report a failed target run and exit. Compose failures keep the compose
 * tool's exit status.
 */
export function handleFailure(err: unknown): never {
  if (err instanceof UnknownTargetError) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.dim("Run 'gisnav-deploy list' to see available targets."));
    process.exit(1);
  }

  const status = exitStatusOf(err);
  if (status !== undefined) {
    console.error(chalk.red(`Error: command failed with exit code ${status}`));
    process.exit(status);
  }

  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`Error: ${message}`));
  process.exit(1);
}

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name("gisnav-deploy")
    .description("Deploy GISNav Docker Compose services for HIL, SITL, onboard and offboard setups")
    .version(version)
    .option("-c, --config <path>", "Path to gisnav-deploy.json5 config file")
    .option("-n, --dry-run", "Print the commands instead of running them");

  // Helper to load config and run an action with the shared run options
  function withConfig(action: (config: DeployConfig, paths: ConfigPaths, options: RunOptions) => void): void {
    const opts = program.opts<GlobalOptions>();
    const paths = resolveConfigPaths(opts.config);
    const { config, issues } = loadConfig(paths);

    if (issues.length > 0) {
      printValidationErrors(paths.configFile, issues);
      process.exit(1);
    }

    const dryRun = opts.dryRun ?? false;
    if (!dryRun) {
      requireDocker();
    }

    try {
      action(config, paths, { dryRun });
    } catch (err: unknown) {
      handleFailure(err);
    }
  }

  // init command - doesn't need config
  program
    .command("init")
    .description("Write a default gisnav-deploy.json5 in the current directory")
    .action(() => {
      initCommand();
    });

  program
    .command("list")
    .description("List all targets")
    .action(() => {
      listCommand();
    });

  program
    .command("create <scenario> <autopilot>")
    .description("Create containers for a scenario (e.g. 'create offboard-sitl px4')")
    .action((scenario: string, autopilot: string) => {
      withConfig((config, paths, options) => createCommand(config, paths, scenario, autopilot, options));
    });

  program
    .command("build [scenario] [autopilot]")
    .description("Build images for a scenario, or every service when no scenario is given")
    .action((scenario: string | undefined, autopilot: string | undefined) => {
      withConfig((config, paths, options) => buildCommand(config, paths, scenario, autopilot, options));
    });

  program
    .command("up <scenario> <autopilot>")
    .description("Create, expose X server access and start a scenario in the background")
    .action((scenario: string, autopilot: string) => {
      withConfig((config, paths, options) => upCommand(config, paths, scenario, autopilot, options));
    });

  program
    .command("demo")
    .description("Bring up the PX4 SITL development stack and run GISNav attached")
    .action(() => {
      withConfig(demoCommand);
    });

  program
    .command("down")
    .description("Stop and remove all containers")
    .action(() => {
      withConfig(downCommand);
    });

  program
    .command("start")
    .description("Start existing containers (create them first)")
    .action(() => {
      withConfig(startCommand);
    });

  program
    .command("stop")
    .description("Stop all containers without removing them")
    .action(() => {
      withConfig(stopCommand);
    });

  program
    .command("expose-xhost")
    .description("Grant X server access to containers of GUI services")
    .action(() => {
      withConfig(exposeXhostCommand);
    });

  program
    .command("run <targets...>")
    .description("Run targets by name (e.g. 'run up-offboard-sitl-dev-ardupilot')")
    .action((targets: string[]) => {
      withConfig((config, paths, options) => runCommand(config, paths, targets, options));
    });

  return program;
}
