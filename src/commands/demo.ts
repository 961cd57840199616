/**
 * demo command - Bring up the PX4 SITL development stack and run GISNav attached
 */

import type { ConfigPaths, DeployConfig } from "../lib/config.js";
import type { RunOptions } from "../lib/runner.js";
import { runTargets } from "../lib/runner.js";
import { DEMO_TARGET } from "../lib/targets.js";

export function demoCommand(config: DeployConfig, paths: ConfigPaths, options: RunOptions = {}): void {
  runTargets([DEMO_TARGET], config, paths, options);
}
