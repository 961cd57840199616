/**
 * Docker command execution wrappers
 */

import { execSync } from "node:child_process";
import chalk from "chalk";

export interface DockerStatus {
  installed: boolean;
  running: boolean;
  error?: string;
}

/**
 * Check if Docker is installed on the system
 */
export function isDockerInstalled(): boolean {
  try {
    execSync("docker --version", {
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
    });
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if Docker daemon is running
 */
export function isDockerDaemonRunning(): boolean {
  try {
    execSync("docker info", {
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
    });
    return true;
  } catch {
    return false;
  }
}

/**
 * Check Docker availability and return status
 */
export function checkDocker(): DockerStatus {
  if (!isDockerInstalled()) {
    return {
      installed: false,
      running: false,
      error: "Docker is not installed. See https://docs.docker.com/engine/install/",
    };
  }

  if (!isDockerDaemonRunning()) {
    return {
      installed: true,
      running: false,
      error: "Docker daemon is not running. Start it with 'sudo systemctl start docker'",
    };
  }

  return { installed: true, running: true };
}

/**
 * Require Docker to be available, exit with error if not
 */
export function requireDocker(): void {
  const status = checkDocker();
  if (!status.running) {
    console.error(chalk.red(`Error: ${status.error}`));
    process.exit(1);
  }
}

export interface DockerExecOptions {
  cwd?: string;
}

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,.\/-]+$/;

/** Quote one argument for a POSIX shell, leaving plain words as they are */
export function shellQuote(arg: string): string {
  if (SHELL_SAFE.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/** Shell form of a `docker compose` invocation */
export function composeCommandLine(args: readonly string[]): string {
  return ["docker", "compose", ...args].map(shellQuote).join(" ");
}

/**
 * Run docker compose command. Throws with the tool's exit status on failure.
 */
export function dockerCompose(args: readonly string[], options: DockerExecOptions = {}): void {
  execSync(composeCommandLine(args), {
    cwd: options.cwd,
    stdio: "inherit",
    encoding: "utf-8",
  });
}

/**
 * IDs of every container (running or not) in a compose project
 */
export function listProjectContainers(project: string): string[] {
  const filter = shellQuote(`label=com.docker.compose.project=${project}`);
  const output = execSync(`docker ps -a -q --filter ${filter}`, {
    encoding: "utf-8",
    stdio: ["pipe", "pipe", "pipe"],
  });
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

function inspectField(containerId: string, template: string): string {
  const output = execSync(`docker inspect --format ${shellQuote(template)} ${shellQuote(containerId)}`, {
    encoding: "utf-8",
    stdio: ["pipe", "pipe", "pipe"],
  });
  return output.trim();
}

/**
 * Compose service name a container was created for, empty if unlabelled
 */
export function getContainerServiceName(containerId: string): string {
  return inspectField(containerId, '{{index .Config.Labels "com.docker.compose.service"}}');
}

export function getContainerHostname(containerId: string): string {
  return inspectField(containerId, "{{.Config.Hostname}}");
}

/**
 * Allow local connections from a container to the host X server
 */
export function grantLocalXhost(hostname: string): void {
  execSync(`xhost ${shellQuote(`+local:${hostname}`)}`, {
    encoding: "utf-8",
    stdio: "inherit",
  });
}
