import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join, resolve } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const logState = vi.hoisted(() => ({ warnings: [] as string[] }));
const fsState = vi.hoisted(() => ({ failTemporaryWriteAfterPartial: false }));

vi.mock("node:fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs")>();
  return {
    ...actual,
    writeFileSync: (...args: Parameters<typeof actual.writeFileSync>) => {
      const [file] = args;
      if (fsState.failTemporaryWriteAfterPartial && String(file).endsWith(".tmp")) {
        actual.writeFileSync(file, "{\n  \"dev_fo", "utf8");
        throw new Error("ENOSPC: no space left on device");
      }
      actual.writeFileSync(...args);
    }
  };
});

vi.mock("@clack/prompts", () => ({
  log: {
    warn: (message: string) => {
      logState.warnings.push(message);
    }
  }
}));

import {
  ConfigStore,
  DEFAULT_DEV_FOLDER,
  DEFAULT_IDE,
  expandHome,
  normalizeConfigKey,
  resolveConfigPath,
  resolveDevFolder
} from "../src/core/config.js";
import { ConfigError, UserInputError } from "../src/core/errors.js";

describe("ConfigStore", () => {
  let configDir: string;
  let configPath: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), "flow-config-"));
    configPath = join(configDir, "nested", "config.json");
    logState.warnings = [];
    fsState.failTemporaryWriteAfterPartial = false;
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  it("returns the documented defaults when no file exists", () => {
    const store = new ConfigStore(configPath);
    expect(store.load()).toEqual({ devFolder: "~/Development", ide: "cursor" });
    expect(DEFAULT_DEV_FOLDER).toBe("~/Development");
    expect(DEFAULT_IDE).toBe("cursor");
    expect(logState.warnings).toEqual([]);
  });

  it("writes the persisted shape and creates parent directories", () => {
    const store = new ConfigStore(configPath);
    store.save({ devFolder: "/work/projects", ide: "zed" });

    expect(JSON.parse(readFileSync(configPath, "utf8"))).toEqual({ dev_folder: "/work/projects", ide: "zed" });
  });

  it("round-trips save(load()) without changing values", () => {
    const store = new ConfigStore(configPath);
    store.save({ devFolder: "/work/projects", ide: "vscode" });

    const first = store.load();
    store.save(first);
    expect(store.load()).toEqual(first);
    expect(first).toEqual({ devFolder: "/work/projects", ide: "vscode" });
  });

  it("defaults missing or blank keys and ignores unknown ones", () => {
    mkdirSync(join(configDir, "nested"));
    writeFileSync(configPath, JSON.stringify({ ide: "  ", theme: "dark" }));

    expect(new ConfigStore(configPath).load()).toEqual({ devFolder: "~/Development", ide: "cursor" });
  });

  it("falls back to defaults with a warning on malformed JSON", () => {
    mkdirSync(join(configDir, "nested"));
    writeFileSync(configPath, "{ not json");

    expect(new ConfigStore(configPath).load()).toEqual({ devFolder: "~/Development", ide: "cursor" });
    expect(logState.warnings).toEqual([`Config at ${configPath} is not valid JSON; using defaults.`]);
  });

  it("falls back to defaults when the file holds a non-object", () => {
    mkdirSync(join(configDir, "nested"));
    writeFileSync(configPath, "[1, 2]");

    expect(new ConfigStore(configPath).load()).toEqual({ devFolder: "~/Development", ide: "cursor" });
    expect(logState.warnings).toEqual([`Config at ${configPath} is not a JSON object; using defaults.`]);
  });

  it("updates one key and preserves the others", () => {
    const store = new ConfigStore(configPath);
    store.save({ devFolder: "/work/projects", ide: "zed" });

    expect(store.update({ ide: "webstorm" })).toEqual({ devFolder: "/work/projects", ide: "webstorm" });
    expect(store.load()).toEqual({ devFolder: "/work/projects", ide: "webstorm" });
  });

  it("raises ConfigError when the path cannot be written", () => {
    const blocker = join(configDir, "blocker");
    writeFileSync(blocker, "file, not a directory");
    const store = new ConfigStore(join(blocker, "config.json"));

    expect(() => store.save({ devFolder: "/work", ide: "zed" })).toThrow(ConfigError);
    expect(() => store.save({ devFolder: "/work", ide: "zed" })).toThrow(`Could not write config to ${join(blocker, "config.json")}`);
  });

  it("removes a partially written temporary file when saving fails", () => {
    const store = new ConfigStore(configPath);
    store.save({ devFolder: "/work", ide: "zed" });
    fsState.failTemporaryWriteAfterPartial = true;

    expect(() => store.save({ devFolder: "/elsewhere", ide: "code" })).toThrow(
      `Could not write config to ${configPath}: ENOSPC: no space left on device`
    );
    expect(readdirSync(join(configDir, "nested"))).toEqual(["config.json"]);
    expect(store.load()).toEqual({ devFolder: "/work", ide: "zed" });
  });
});

describe("config helpers", () => {
  it("resolves the config path from FLOW_CONFIG_DIR or the home directory", () => {
    expect(resolveConfigPath({ FLOW_CONFIG_DIR: "/tmp/flow-settings" })).toBe(join(resolve("/tmp/flow-settings"), "config.json"));
    expect(resolveConfigPath({})).toBe(join(homedir(), ".flow", "config.json"));
  });

  it("expands a leading tilde only", () => {
    expect(expandHome("~")).toBe(homedir());
    expect(expandHome("~/Development")).toBe(join(homedir(), "Development"));
    expect(expandHome("/srv/~cache")).toBe("/srv/~cache");
    expect(resolveDevFolder({ devFolder: "~/code", ide: "zed" })).toBe(join(homedir(), "code"));
  });

  it("accepts config key aliases and rejects unknown keys", () => {
    expect(normalizeConfigKey("dev_folder")).toBe("devFolder");
    expect(normalizeConfigKey("dev-folder")).toBe("devFolder");
    expect(normalizeConfigKey(" ide ")).toBe("ide");
    expect(() => normalizeConfigKey("theme")).toThrow(UserInputError);
  });
});
