/**
 * Config validation helpers
 */

import chalk from "chalk";

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Recursively scan a config object for unresolved ${VAR} references.
 * Runs after env expansion, so any remaining ${...} pattern means a
 * variable was not defined in the environment or .env file.
 */
export function findUnresolvedVars(obj: unknown, path: string[] = []): ValidationIssue[] {
  if (typeof obj === "string") {
    const matches = [...obj.matchAll(/\$\{([^}]+)\}/g)];
    return matches.map((m) => ({
      path: path.join(".") || "<root>",
      message: `Unresolved variable: ${m[0]}`,
    }));
  }
  if (Array.isArray(obj)) {
    return obj.flatMap((v, i) => findUnresolvedVars(v, [...path, String(i)]));
  }
  if (obj !== null && typeof obj === "object") {
    return Object.entries(obj).flatMap(([k, v]) => findUnresolvedVars(v, [...path, k]));
  }
  return [];
}

/**
 * Print validation errors to console
 */
export function printValidationErrors(context: string, issues: ValidationIssue[]): void {
  console.error(chalk.red(`\n  Validation errors in ${context}:`));
  for (const issue of issues) {
    console.error(chalk.red(`    - ${issue.path}: ${issue.message}`));
  }
}
