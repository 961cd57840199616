import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { copyFileSync, existsSync, mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { loadConfig, resolveConfigPaths } from "./config.js";
import { copyTemplates } from "./templates.js";

describe("copyTemplates", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "gisnav-deploy-init-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the config and env templates", () => {
    expect(copyTemplates(dir)).toEqual(["gisnav-deploy.json5", ".env.example"]);
    expect(existsSync(join(dir, "gisnav-deploy.json5"))).toBe(true);
    expect(existsSync(join(dir, ".env.example"))).toBe(true);
  });

  it("keeps files that already exist", () => {
    copyTemplates(dir);
    expect(copyTemplates(dir)).toEqual([]);
  });

  it("ships a config template that validates once .env is in place", () => {
    delete process.env.COMPOSE_PROJECT;
    copyTemplates(dir);
    copyFileSync(join(dir, ".env.example"), join(dir, ".env"));

    const { config, issues } = loadConfig(resolveConfigPaths(join(dir, "gisnav-deploy.json5")));
    delete process.env.COMPOSE_PROJECT;

    expect(issues).toEqual([]);
    expect(config.project).toBe("gisnav");
    expect(config.compose.dir).toBe("docker");
  });
});
