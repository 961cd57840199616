/**
 * Docker Compose argument construction
 */

/**
 * File flags for a set of override files. The base file is only passed
 * alongside overrides; with none, compose falls back to its own defaults.
 */
export function composeFileArgs(overrideFiles: readonly string[], baseFile: string): string[] {
  if (overrideFiles.length === 0) {
    return [];
  }
  return [baseFile, ...overrideFiles].flatMap((file) => ["-f", file]);
}

/**
 * Full argument list for `docker compose`, e.g.
 * `-p gisnav -f docker-compose.yaml -f docker-compose.arm64.yaml up -d gisnav`
 */
export function composeArgs(
  project: string,
  fileArgs: readonly string[],
  subcommand: readonly string[],
  services: readonly string[] = []
): string[] {
  return ["-p", project, ...fileArgs, ...subcommand, ...services];
}

/** Compose subcommand for each target action */
export const ACTION_SUBCOMMANDS = {
  create: ["create"],
  build: ["build"],
  up: ["up", "-d"],
} as const satisfies Record<string, readonly string[]>;
