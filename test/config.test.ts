import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { configure, defaults, getConfig, loadConfigFile, resetConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const dirs: string[] = [];

function writeConfig(contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), "taskforge-config-"));
  dirs.push(dir);
  const path = join(dir, "taskforge.json");
  writeFileSync(path, contents);
  return path;
}

afterEach(() => {
  resetConfig();
  for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("config", () => {
  it("starts from the defaults", () => {
    expect(getConfig()).toEqual(defaults);
    expect(getConfig().budget.sessionLimit).toBe(100_000);
  });

  it("merges overrides deeply", () => {
    configure({ limits: { maxConcurrency: 8 }, models: { premium: "big-model" } });
    expect(getConfig().limits).toEqual({ ...defaults.limits, maxConcurrency: 8 });
    expect(getConfig().models).toEqual({ economy: "haiku", standard: "sonnet", premium: "big-model" });
  });

  it("applies each call over the defaults, not the previous call", () => {
    configure({ limits: { maxConcurrency: 8 } });
    configure({ limits: { maxIterations: 9 } });
    expect(getConfig().limits.maxConcurrency).toBe(4);
    expect(getConfig().limits.maxIterations).toBe(9);
  });

  it("rejects role percentages that do not sum to 100", () => {
    expect(() => configure({ budget: { roleAllocation: { implementer: 50 } } })).toThrow(ConfigError);
    expect(getConfig()).toEqual(defaults);
  });

  it("loads a JSON config file", () => {
    const path = writeConfig(JSON.stringify({ budget: { dailyLimit: 1_000 }, limits: { stallLimit: 3 } }));
    loadConfigFile(path);
    expect(getConfig().budget.dailyLimit).toBe(1_000);
    expect(getConfig().limits.stallLimit).toBe(3);
  });

  it("rejects unknown keys and bad values in a file", () => {
    expect(() => loadConfigFile(writeConfig('{"colour":"blue"}'))).toThrow(/^Invalid config file /);
    expect(() => loadConfigFile(writeConfig('{"limits":{"maxConcurrency":0}}'))).toThrow(ConfigError);
  });

  it("reports a file it cannot read", () => {
    expect(() => loadConfigFile(join(tmpdir(), "taskforge-missing", "nope.json"))).toThrow(/^Cannot read config file /);
    expect(() => loadConfigFile(writeConfig("{not json"))).toThrow(ConfigError);
  });
});
