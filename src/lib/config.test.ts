import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { composeDir, defaultConfig, expandEnvVars, loadConfig, normalizeConfig, resolveConfigPaths } from "./config.js";

describe("expandEnvVars", () => {
  beforeEach(() => {
    process.env.GISNAV_DEPLOY_TEST_PROJECT = "sitl";
    delete process.env.GISNAV_DEPLOY_TEST_UNSET;
  });

  afterEach(() => {
    delete process.env.GISNAV_DEPLOY_TEST_PROJECT;
  });

  it("expands set variables and leaves unset ones in place", () => {
    expect(
      expandEnvVars({
        project: "${GISNAV_DEPLOY_TEST_PROJECT}-bench",
        gui_services: ["${GISNAV_DEPLOY_TEST_UNSET}", "qgc"],
        count: 3,
      })
    ).toEqual({
      project: "sitl-bench",
      gui_services: ["${GISNAV_DEPLOY_TEST_UNSET}", "qgc"],
      count: 3,
    });
  });
});

describe("normalizeConfig", () => {
  it("returns defaults for an empty file", () => {
    expect(normalizeConfig(undefined)).toEqual({ config: defaultConfig(), issues: [] });
  });

  it("merges provided values over defaults", () => {
    const { config, issues } = normalizeConfig({
      project: "drone",
      compose: { dir: "docker" },
      gui_services: ["qgc"],
    });
    expect(issues).toEqual([]);
    expect(config).toEqual({
      project: "drone",
      compose: { dir: "docker", file: "docker-compose.yaml" },
      gui_services: ["qgc"],
    });
  });

  it("reports invalid values and falls back to defaults", () => {
    const { config, issues } = normalizeConfig({ project: "", gui_services: "qgc" });
    expect(issues).toEqual([
      { path: "project", message: "Expected lowercase letters, digits, '-' or '_', starting with a letter or digit" },
      { path: "gui_services", message: "Expected a list of service names" },
    ]);
    expect(config).toEqual(defaultConfig());
  });

  it("rejects a project name compose would not accept", () => {
    const { issues } = normalizeConfig({ project: "field test", compose: { file: "base compose.yaml" } });
    expect(issues).toEqual([
      { path: "project", message: "Expected lowercase letters, digits, '-' or '_', starting with a letter or digit" },
    ]);
  });

  it("reports nested type errors by path", () => {
    expect(normalizeConfig({ compose: { dir: 3 }, gui_services: ["qgc", ""] }).issues).toEqual([
      { path: "compose.dir", message: "Expected a non-empty string" },
      { path: "gui_services.1", message: "Expected a service name" },
    ]);
  });

  it("reports unresolved variables", () => {
    expect(normalizeConfig({ compose: { dir: "${GISNAV_DEPLOY_TEST_UNSET}" } }).issues).toEqual([
      { path: "compose.dir", message: "Unresolved variable: ${GISNAV_DEPLOY_TEST_UNSET}" },
    ]);
  });

  it("rejects non-object content", () => {
    expect(normalizeConfig(["gisnav"]).issues).toEqual([{ path: "<root>", message: "Expected an object" }]);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "gisnav-deploy-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("uses defaults when the config file is missing", () => {
    const paths = resolveConfigPaths(join(dir, "gisnav-deploy.json5"));
    expect(loadConfig(paths)).toEqual({ config: defaultConfig(), issues: [] });
  });

  it("parses JSON5 with comments and trailing commas", () => {
    const configFile = join(dir, "gisnav-deploy.json5");
    writeFileSync(configFile, `{\n  // field laptop\n  project: "field",\n  compose: { dir: "docker", },\n}\n`);

    const paths = resolveConfigPaths(configFile);
    const { config, issues } = loadConfig(paths);

    expect(issues).toEqual([]);
    expect(config.project).toBe("field");
    expect(composeDir(config, paths)).toBe(join(dir, "docker"));
  });

  it("expands variables from the .env file beside the config", () => {
    writeFileSync(join(dir, ".env"), "GISNAV_DEPLOY_TEST_FROM_DOTENV=bench\n");
    const configFile = join(dir, "gisnav-deploy.json5");
    writeFileSync(configFile, `{ project: "\${GISNAV_DEPLOY_TEST_FROM_DOTENV}" }`);

    const { config } = loadConfig(resolveConfigPaths(configFile));
    expect(config.project).toBe("bench");
    delete process.env.GISNAV_DEPLOY_TEST_FROM_DOTENV;
  });

  it("reports a parse error as a root issue", () => {
    const configFile = join(dir, "gisnav-deploy.json5");
    writeFileSync(configFile, "{ project: ");

    const { issues } = loadConfig(resolveConfigPaths(configFile));
    expect(issues).toHaveLength(1);
    expect(issues[0]?.path).toBe("<root>");
  });
});
