/**
 * Deployment catalog: autopilots, middleware and scenario definitions
 *
 * Terminology:
 *   - HIL: hardware-in-the-loop, the autopilot runs on the flight
 *     controller board.
 *   - SITL: software-in-the-loop, the autopilot runs in simulation on a
 *     separate computer.
 *   - Onboard: services on the drone's companion computer.
 *   - Offboard: services on a computer not carried by the drone.
 *   - Middleware: services bridging the autopilot and GISNav.
 */

// Must match service names in docker-compose.yaml
export const AUTOPILOTS = ["px4", "ardupilot"] as const;

export type Autopilot = (typeof AUTOPILOTS)[number];

export function isAutopilot(value: string): value is Autopilot {
  return AUTOPILOTS.some((autopilot) => autopilot === value);
}

export const TARGET_ACTIONS = ["create", "build", "up"] as const;

export type TargetAction = (typeof TARGET_ACTIONS)[number];

export function isTargetAction(value: string): value is TargetAction {
  return TARGET_ACTIONS.some((action) => action === value);
}

export const BASE_COMPOSE_FILE = "docker-compose.yaml";

/** Placeholder in scenario service lists, replaced by the autopilot id */
export const AUTOPILOT_PLACEHOLDER = "$AUTOPILOT";

export interface MiddlewareDefinition {
  prefix: string;
  overrideFiles: string[];
}

export const MIDDLEWARE: readonly MiddlewareDefinition[] = [
  { prefix: "onboard-hil-middleware", overrideFiles: ["docker-compose.serial.yaml"] },
  { prefix: "onboard-sitl-middleware", overrideFiles: [] },
  // same as onboard
  { prefix: "offboard-sitl-middleware", overrideFiles: [] },
];

// PX4 needs micro-ros-agent next to MAVROS for the mock GPS node
export const MIDDLEWARE_SERVICES: Readonly<Record<Autopilot, readonly string[]>> = {
  px4: ["micro-ros-agent", "mavros"],
  ardupilot: ["mavros"],
};

export interface ScenarioDefinition {
  prefix: string;
  description: string;
  // Scenario or middleware prefix whose same-action target runs first
  dependency?: string;
  overrideFiles: string[];
  services: string[];
}

export const SCENARIOS: readonly ScenarioDefinition[] = [
  {
    prefix: "onboard-hil",
    description: "Onboard HIL: GIS server, serial middleware, autoheal, gscam and GISNav",
    dependency: "onboard-hil-middleware",
    overrideFiles: ["docker-compose.arm64.yaml"],
    services: ["mapserver", "autoheal", "gscam", "gisnav"],
  },
  {
    prefix: "onboard-sitl",
    description: "Onboard SITL: as HIL, with UDP middleware instead of serial",
    dependency: "offboard-sitl-middleware",
    overrideFiles: ["docker-compose.arm64.yaml"],
    services: ["mapserver", "gscam", "gisnav"],
  },
  {
    prefix: "offboard-sitl",
    description: "Offboard SITL: Gazebo simulation and QGroundControl",
    overrideFiles: [],
    services: [AUTOPILOT_PLACEHOLDER, "qgc"],
  },
  {
    prefix: "offboard-sitl-test",
    description: "SITL testing: headless Gazebo, middleware, mapserver and gscam",
    dependency: "offboard-sitl-middleware",
    overrideFiles: ["docker-compose.headless.yaml"],
    services: [AUTOPILOT_PLACEHOLDER, "gscam", "mapserver"],
  },
  {
    prefix: "offboard-sitl-dev",
    description: "SITL development: everything except GISNav, which runs locally",
    dependency: "offboard-sitl-middleware",
    overrideFiles: [],
    services: [AUTOPILOT_PLACEHOLDER, "qgc", "gscam", "mapserver", "rviz", "qgis"],
  },
  {
    prefix: "demo",
    description: "Demo: all SITL services offboard, GISNav included",
    dependency: "offboard-sitl-dev",
    overrideFiles: [],
    services: ["gisnav"],
  },
];

// Services that need the X server (see the x11 extension in docker-compose.yaml)
export const GUI_SERVICES: readonly string[] = ["px4", "ardupilot", "qgc", "rviz", "qgis", "gisnav", "fileserver"];

export function findScenario(prefix: string): ScenarioDefinition | undefined {
  return SCENARIOS.find((s) => s.prefix === prefix);
}

export function findMiddleware(prefix: string): MiddlewareDefinition | undefined {
  return MIDDLEWARE.find((m) => m.prefix === prefix);
}

/** Replace the autopilot placeholder in a scenario's service list */
export function expandServices(services: readonly string[], autopilot: Autopilot): string[] {
  return services.map((service) => (service === AUTOPILOT_PLACEHOLDER ? autopilot : service));
}
