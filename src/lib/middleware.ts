/**
 * Middleware service selection by autopilot
 */

import { AUTOPILOTS, MIDDLEWARE_SERVICES, isAutopilot } from "./catalog.js";

/**
 * Services to create/build/start for the given autopilot, or undefined
 * when the identifier is not supported.
 */
export function selectMiddlewareServices(autopilot: string): readonly string[] | undefined {
  return isAutopilot(autopilot) ? MIDDLEWARE_SERVICES[autopilot] : undefined;
}

export function unsupportedAutopilotMessage(autopilot: string): string {
  const options = AUTOPILOTS.map((a) => `'${a}'`).join(" or ");
  return `Unsupported target '${autopilot}' (try ${options}).`;
}
