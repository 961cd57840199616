/**
 * Template file management
 */

import { copyFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import chalk from "chalk";
import { DEFAULTS } from "./config.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
export const TEMPLATES_DIR = join(__dirname, "..", "..", "templates");

export interface TemplateFile {
  name: string;
  required: boolean;
}

const TEMPLATE_FILES: TemplateFile[] = [
  { name: DEFAULTS.configFile, required: true },
  { name: ".env.example", required: false },
];

/**
 * Copy template files to target directory, keeping files that already exist
 */
export function copyTemplates(targetDir: string, templatesDir: string = TEMPLATES_DIR): string[] {
  console.log(chalk.green("=== Initializing GISNav deployment config ==="));

  if (!existsSync(targetDir)) {
    mkdirSync(targetDir, { recursive: true });
  }

  const created: string[] = [];

  for (const file of TEMPLATE_FILES) {
    const src = join(templatesDir, file.name);
    const dest = join(targetDir, file.name);

    if (existsSync(dest)) {
      console.log(`  ${chalk.yellow("SKIP")} ${file.name} already exists`);
      continue;
    }

    if (!existsSync(src)) {
      if (file.required) {
        console.error(chalk.red(`  Error: Template file not found: ${file.name}`));
      }
      continue;
    }

    copyFileSync(src, dest);
    created.push(file.name);
    console.log(`  ${chalk.green("OK")} ${file.name} created`);
  }

  console.log();
  console.log(chalk.yellow("Next steps:"));
  console.log("  1. Copy .env.example to .env and set COMPOSE_PROJECT");
  console.log(`  2. Edit ${DEFAULTS.configFile} if your compose files live elsewhere`);
  console.log("  3. List targets: npx gisnav-deploy list");
  console.log("  4. Run: npx gisnav-deploy demo");
  return created;
}
