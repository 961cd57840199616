/**
 * Configuration loading and parsing for GISNav compose deployments
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import JSON5 from "json5";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { BASE_COMPOSE_FILE, GUI_SERVICES } from "./catalog.js";
import type { ValidationIssue } from "./validate.js";
import { findUnresolvedVars } from "./validate.js";

export const DEFAULTS = {
  project: "gisnav",
  composeDir: ".",
  configFile: "gisnav-deploy.json5",
};

// Compose's own rule for project names
export const PROJECT_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

const nonEmptyString = z
  .string({ invalid_type_error: "Expected a non-empty string" })
  .trim()
  .min(1, "Expected a non-empty string");

const ComposeSettingsSchema = z.object(
  {
    // Directory the compose tool runs in, relative to the config file
    dir: nonEmptyString.default(DEFAULTS.composeDir),
    // Base file passed first whenever override files are given
    file: nonEmptyString.default(BASE_COMPOSE_FILE),
  },
  { invalid_type_error: "Expected an object" }
);

export const DeployConfigSchema = z.object(
  {
    // Compose project name (-p)
    project: z
      .string({ invalid_type_error: "Expected a non-empty string" })
      .regex(PROJECT_NAME_PATTERN, "Expected lowercase letters, digits, '-' or '_', starting with a letter or digit")
      .default(DEFAULTS.project),
    compose: ComposeSettingsSchema.default({}),
    // Services whose containers get X server access
    gui_services: z
      .array(z.string().min(1, "Expected a service name"), {
        invalid_type_error: "Expected a list of service names",
      })
      .default(() => [...GUI_SERVICES]),
  },
  { invalid_type_error: "Expected an object" }
);

export type ComposeSettings = z.infer<typeof ComposeSettingsSchema>;
export type DeployConfig = z.infer<typeof DeployConfigSchema>;

/**
 * Expand environment variables in strings: ${VAR} -> process.env.VAR
 * Unset variables are left in place so validation can report them.
 */
export function expandEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{(\w+)\}/g, (match: string, name: string) => process.env[name] ?? match);
  }
  if (Array.isArray(value)) {
    return value.map(expandEnvVars);
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = expandEnvVars(v);
    }
    return result;
  }
  return value;
}

export interface ConfigPaths {
  configFile: string;
  baseDir: string;
}

/**
 * Resolve configuration paths based on config file location
 */
export function resolveConfigPaths(configPath?: string): ConfigPaths {
  const configFile = configPath
    ? resolve(configPath)
    : join(process.cwd(), DEFAULTS.configFile);

  return {
    configFile,
    baseDir: dirname(configFile),
  };
}

/** Directory `docker compose` is run from */
export function composeDir(config: DeployConfig, paths: ConfigPaths): string {
  return resolve(paths.baseDir, config.compose.dir);
}

export function defaultConfig(): DeployConfig {
  return {
    project: DEFAULTS.project,
    compose: { dir: DEFAULTS.composeDir, file: BASE_COMPOSE_FILE },
    gui_services: [...GUI_SERVICES],
  };
}

export interface LoadedConfig {
  config: DeployConfig;
  issues: ValidationIssue[];
}

/**
 * Validate parsed file content against the config schema. Any issue means
 * the defaults are returned alongside the issues.
 */
export function normalizeConfig(raw: unknown): LoadedConfig {
  if (raw === undefined || raw === null) {
    return { config: defaultConfig(), issues: [] };
  }

  const issues: ValidationIssue[] = findUnresolvedVars(raw);
  const result = DeployConfigSchema.safeParse(raw);
  if (!result.success) {
    issues.push(
      ...result.error.issues.map((issue) => ({
        path: issue.path.join(".") || "<root>",
        message: issue.message,
      }))
    );
  }

  if (!result.success || issues.length > 0) {
    return { config: defaultConfig(), issues };
  }
  return { config: result.data, issues };
}

/**
 * Load configuration from the JSON5 file. A missing file yields defaults.
 */
export function loadConfig(paths: ConfigPaths): LoadedConfig {
  // Load .env from the config directory
  loadDotenv({ path: join(paths.baseDir, ".env") });

  if (!existsSync(paths.configFile)) {
    return { config: defaultConfig(), issues: [] };
  }

  const content = readFileSync(paths.configFile, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { config: defaultConfig(), issues: [{ path: "<root>", message }] };
  }
  return normalizeConfig(expandEnvVars(parsed));
}
