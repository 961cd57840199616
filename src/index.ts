/**
 * gisnav-deploy - Deploy GISNav Docker Compose services
 *
 * This module exports the core functionality for programmatic use.
 */

// Types
export type { ComposeSettings, ConfigPaths, DeployConfig, LoadedConfig } from "./lib/config.js";
export type { Autopilot, MiddlewareDefinition, ScenarioDefinition, TargetAction } from "./lib/catalog.js";
export type { PlanStep, TargetDefinition, TargetRef, TargetSummary } from "./lib/targets.js";
export type { RunOptions } from "./lib/runner.js";
export type { XhostGrant } from "./lib/xhost.js";
export type { ValidationIssue } from "./lib/validate.js";

// Config utilities
export {
  loadConfig,
  normalizeConfig,
  resolveConfigPaths,
  expandEnvVars,
  defaultConfig,
  DEFAULTS,
  DeployConfigSchema,
} from "./lib/config.js";

// Catalog
export {
  AUTOPILOTS,
  GUI_SERVICES,
  MIDDLEWARE,
  MIDDLEWARE_SERVICES,
  SCENARIOS,
  isAutopilot,
} from "./lib/catalog.js";

// Target generation
export { composeArgs, composeFileArgs } from "./lib/compose.js";
export { selectMiddlewareServices, unsupportedAutopilotMessage } from "./lib/middleware.js";
export { listTargets, parseTarget, planTargets, resolveTarget, UnknownTargetError } from "./lib/targets.js";
export { executePlan, runTargets } from "./lib/runner.js";
export { exposeXhost } from "./lib/xhost.js";

// Docker utilities
export { checkDocker, dockerCompose, listProjectContainers, requireDocker } from "./lib/docker.js";

// Commands
export { createProgram } from "./program.js";
