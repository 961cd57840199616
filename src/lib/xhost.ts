/**
 * X server access for GUI containers
 *
 * Access is granted per container hostname and is never revoked; it lasts
 * until the host session ends.
 */

import chalk from "chalk";
import type { DeployConfig } from "./config.js";
import {
  getContainerHostname,
  getContainerServiceName,
  grantLocalXhost,
  listProjectContainers,
} from "./docker.js";

export interface XhostGrant {
  containerId: string;
  service: string;
  hostname: string;
}

// A container removed after it was listed has nothing left to inspect
function inspectOrEmpty(inspect: (containerId: string) => string, containerId: string): string {
  try {
    return inspect(containerId);
  } catch {
    return "";
  }
}

/**
 * Grant X server access to every project container whose compose service
 * is in the GUI allowlist. Other containers, and ones that can no longer
 * be inspected, are left alone.
 */
export function exposeXhost(config: DeployConfig): XhostGrant[] {
  const allowed = new Set(config.gui_services);
  const grants: XhostGrant[] = [];

  for (const containerId of listProjectContainers(config.project)) {
    const service = inspectOrEmpty(getContainerServiceName, containerId);
    if (!service || !allowed.has(service)) {
      continue;
    }

    const hostname = inspectOrEmpty(getContainerHostname, containerId);
    if (!hostname) {
      continue;
    }
    grantLocalXhost(hostname);
    console.log(chalk.dim(`  ${service}: X server access granted to ${hostname}`));
    grants.push({ containerId, service, hostname });
  }

  return grants;
}
