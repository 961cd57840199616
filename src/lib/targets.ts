/**
 * Target generation and planning
 *
 * Every scenario expands into create/build/up targets per autopilot, e.g.
 * `up-offboard-sitl-dev-px4`. An `up` target first creates its own
 * containers and exposes the X server to them, then brings up the
 * scenario it depends on.
 */

import type { Autopilot, MiddlewareDefinition, ScenarioDefinition, TargetAction } from "./catalog.js";
import {
  AUTOPILOTS,
  MIDDLEWARE,
  SCENARIOS,
  TARGET_ACTIONS,
  expandServices,
  isAutopilot,
  isTargetAction,
} from "./catalog.js";
import { ACTION_SUBCOMMANDS, composeArgs, composeFileArgs } from "./compose.js";
import type { DeployConfig } from "./config.js";
import { selectMiddlewareServices, unsupportedAutopilotMessage } from "./middleware.js";

export type PlanStep =
  | { kind: "compose"; target: string; args: string[] }
  | { kind: "expose-xhost"; target: string }
  | { kind: "message"; target: string; message: string };

export interface TargetDefinition {
  name: string;
  prerequisites: string[];
  steps: PlanStep[];
}

export interface TargetSummary {
  name: string;
  description: string;
}

export type TargetRef =
  | { kind: "scenario"; action: TargetAction; scenario: ScenarioDefinition; autopilot: Autopilot }
  | { kind: "middleware"; action: TargetAction; middleware: MiddlewareDefinition; stem: string }
  | { kind: "project"; name: ProjectTarget }
  | { kind: "demo" }
  | { kind: "expose-xhost" };

export const EXPOSE_XHOST_TARGET = "expose-xhost";

export const DEMO_TARGET = "demo";

// Demo brings up the development stack, then runs GISNav attached
const DEMO_DEPENDENCY = "up-offboard-sitl-dev-px4";
const DEMO_SERVICE = "gisnav";

/** Project-wide targets: one compose subcommand, no service list */
export const PROJECT_TARGETS = {
  down: "Stop and remove all containers of the project",
  start: "Start existing containers (create them first)",
  stop: "Stop all containers without removing them",
  build: "Build every service in the compose files",
} as const;

export type ProjectTarget = keyof typeof PROJECT_TARGETS;

function isProjectTarget(name: string): name is ProjectTarget {
  return Object.hasOwn(PROJECT_TARGETS, name);
}

export class UnknownTargetError extends Error {
  constructor(
    public readonly target: string,
    public readonly neededBy?: string
  ) {
    super(
      neededBy
        ? `No rule to make target '${target}', needed by '${neededBy}'`
        : `No rule to make target '${target}'`
    );
    this.name = "UnknownTargetError";
  }
}

export function targetName(action: TargetAction, prefix: string, autopilot: string): string {
  return `${action}-${prefix}-${autopilot}`;
}

// Longest prefix first: the most specific pattern wins
const MIDDLEWARE_BY_LENGTH = [...MIDDLEWARE].sort((a, b) => b.prefix.length - a.prefix.length);

/**
 * Parse a target name into what it refers to. Scenario targets exist only
 * for supported autopilots; middleware targets accept any identifier and
 * report unsupported ones when run.
 */
export function parseTarget(name: string): TargetRef | undefined {
  if (name === EXPOSE_XHOST_TARGET) return { kind: "expose-xhost" };
  if (name === DEMO_TARGET) return { kind: "demo" };
  if (isProjectTarget(name)) return { kind: "project", name };

  const dash = name.indexOf("-");
  if (dash < 0) return undefined;

  const action = name.slice(0, dash);
  if (!isTargetAction(action)) return undefined;
  const rest = name.slice(dash + 1);

  for (const scenario of SCENARIOS) {
    if (!rest.startsWith(`${scenario.prefix}-`)) continue;
    const autopilot = rest.slice(scenario.prefix.length + 1);
    if (isAutopilot(autopilot)) {
      return { kind: "scenario", action, scenario, autopilot };
    }
  }

  for (const middleware of MIDDLEWARE_BY_LENGTH) {
    if (!rest.startsWith(`${middleware.prefix}-`)) continue;
    const stem = rest.slice(middleware.prefix.length + 1);
    if (stem !== "") {
      return { kind: "middleware", action, middleware, stem };
    }
  }

  return undefined;
}

function scenarioPrerequisites(
  action: TargetAction,
  scenario: ScenarioDefinition,
  autopilot: Autopilot
): string[] {
  const dependency = scenario.dependency ? [targetName(action, scenario.dependency, autopilot)] : [];
  if (action !== "up") {
    return dependency;
  }
  // Containers must exist before the X server can be exposed to them
  return [targetName("create", scenario.prefix, autopilot), EXPOSE_XHOST_TARGET, ...dependency];
}

/**
 * Resolve a target name into its prerequisites and the steps it runs
 */
export function resolveTarget(name: string, config: DeployConfig): TargetDefinition | undefined {
  const ref = parseTarget(name);
  if (!ref) return undefined;

  switch (ref.kind) {
    case "scenario": {
      const { action, scenario, autopilot } = ref;
      const args = composeArgs(
        config.project,
        composeFileArgs(scenario.overrideFiles, config.compose.file),
        ACTION_SUBCOMMANDS[action],
        expandServices(scenario.services, autopilot)
      );
      return {
        name,
        prerequisites: scenarioPrerequisites(action, scenario, autopilot),
        steps: [{ kind: "compose", target: name, args }],
      };
    }
    case "middleware": {
      const { action, middleware, stem } = ref;
      const services = selectMiddlewareServices(stem);
      if (!services) {
        return {
          name,
          prerequisites: [],
          steps: [{ kind: "message", target: name, message: unsupportedAutopilotMessage(stem) }],
        };
      }
      const args = composeArgs(
        config.project,
        composeFileArgs(middleware.overrideFiles, config.compose.file),
        ACTION_SUBCOMMANDS[action],
        services
      );
      return { name, prerequisites: [], steps: [{ kind: "compose", target: name, args }] };
    }
    case "project":
      return {
        name,
        prerequisites: [],
        steps: [{ kind: "compose", target: name, args: composeArgs(config.project, [], [ref.name]) }],
      };
    case "demo":
      return {
        name,
        prerequisites: [DEMO_DEPENDENCY],
        steps: [{ kind: "compose", target: name, args: composeArgs(config.project, [], ["up"], [DEMO_SERVICE]) }],
      };
    case "expose-xhost":
      return { name, prerequisites: [], steps: [{ kind: "expose-xhost", target: name }] };
  }
}

/**
 * Expand targets into an ordered list of steps. Prerequisites come first,
 * left to right, and every target runs at most once. All names are
 * resolved before anything is returned, so an unknown target means no
 * step runs at all.
 */
export function planTargets(names: readonly string[], config: DeployConfig): PlanStep[] {
  const visited = new Set<string>();
  const steps: PlanStep[] = [];

  const visit = (name: string, neededBy?: string): void => {
    if (visited.has(name)) return;
    visited.add(name);

    const target = resolveTarget(name, config);
    if (!target) {
      throw new UnknownTargetError(name, neededBy);
    }
    for (const prerequisite of target.prerequisites) {
      visit(prerequisite, name);
    }
    steps.push(...target.steps);
  };

  for (const name of names) {
    visit(name);
  }
  return steps;
}

/** Every public target with a short description */
export function listTargets(): TargetSummary[] {
  const targets: TargetSummary[] = [];

  for (const scenario of SCENARIOS) {
    for (const action of TARGET_ACTIONS) {
      for (const autopilot of AUTOPILOTS) {
        targets.push({ name: targetName(action, scenario.prefix, autopilot), description: scenario.description });
      }
    }
  }

  for (const middleware of MIDDLEWARE) {
    for (const action of TARGET_ACTIONS) {
      for (const autopilot of AUTOPILOTS) {
        targets.push({
          name: targetName(action, middleware.prefix, autopilot),
          description: `Middleware for ${autopilot}`,
        });
      }
    }
  }

  targets.push({ name: DEMO_TARGET, description: "Bring up the SITL development stack and run GISNav attached" });
  for (const [name, description] of Object.entries(PROJECT_TARGETS)) {
    targets.push({ name, description });
  }
  targets.push({ name: EXPOSE_XHOST_TARGET, description: "Grant X server access to GUI containers" });

  return targets;
}
