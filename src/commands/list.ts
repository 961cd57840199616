/**
 * list command - Print the target catalog
 */

import chalk from "chalk";
import { listTargets } from "../lib/targets.js";

export function listCommand(): void {
  const targets = listTargets();
  const width = Math.max(...targets.map((t) => t.name.length));

  console.log(chalk.green("=== Targets ==="));
  for (const target of targets) {
    console.log(`  ${chalk.bold(target.name.padEnd(width))}  ${chalk.dim(target.description)}`);
  }
}
