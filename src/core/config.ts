import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";

import { log } from "@clack/prompts";
import { z } from "zod";

import { ConfigError, UserInputError } from "./errors.js";
import { formatJson } from "./text.js";
import type { Config, ConfigKey } from "./types.js";

export const DEFAULT_DEV_FOLDER = "~/Development";
export const DEFAULT_IDE = "cursor";
export const CONFIG_DIR_ENV = "FLOW_CONFIG_DIR";

const persistedConfigSchema = z.object({
  dev_folder: z.string().trim().min(1).catch(DEFAULT_DEV_FOLDER),
  ide: z.string().trim().min(1).catch(DEFAULT_IDE)
});

type PersistedConfig = z.infer<typeof persistedConfigSchema>;

const CONFIG_KEY_ALIASES: Record<string, ConfigKey> = {
  dev_folder: "devFolder",
  "dev-folder": "devFolder",
  devFolder: "devFolder",
  ide: "ide"
};

export function defaultConfig(): Config {
  return { devFolder: DEFAULT_DEV_FOLDER, ide: DEFAULT_IDE };
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_DIR_ENV]?.trim();
  const configDir = override ? resolve(override) : join(homedir(), ".flow");
  return join(configDir, "config.json");
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/") || path.startsWith("~\\")) return join(homedir(), path.slice(2));
  return path;
}

export function resolveDevFolder(config: Config): string {
  return resolve(expandHome(config.devFolder));
}

export function normalizeConfigKey(value: string): ConfigKey {
  const key = CONFIG_KEY_ALIASES[value.trim()];
  if (!key) {
    throw new UserInputError(`Unknown config key "${value}". Expected one of: dev_folder, ide.`);
  }
  return key;
}

function fromPersisted(persisted: PersistedConfig): Config {
  return { devFolder: persisted.dev_folder, ide: persisted.ide };
}

function toPersisted(config: Config): PersistedConfig {
  return { dev_folder: config.devFolder, ide: config.ide };
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class ConfigStore {
  readonly path: string;

  constructor(path: string = resolveConfigPath()) {
    this.path = path;
  }

  /** Never throws: a missing, unreadable or malformed file yields defaults for the affected keys. */
  load(): Config {
    let raw: string;
    try {
      raw = readFileSync(this.path, "utf8");
    } catch (error) {
      if (!isMissingFileError(error)) {
        const reason = error instanceof Error ? error.message : String(error);
        log.warn(`Could not read config at ${this.path} (${reason}); using defaults.`);
      }
      return defaultConfig();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      log.warn(`Config at ${this.path} is not valid JSON; using defaults.`);
      return defaultConfig();
    }

    const result = persistedConfigSchema.safeParse(parsed);
    if (!result.success) {
      log.warn(`Config at ${this.path} is not a JSON object; using defaults.`);
      return defaultConfig();
    }
    return fromPersisted(result.data);
  }

  save(config: Config): void {
    const temporaryPath = `${this.path}.${process.pid}.tmp`;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(temporaryPath, formatJson(toPersisted(config)), "utf8");
      renameSync(temporaryPath, this.path);
    } catch (error) {
      if (existsSync(temporaryPath)) rmSync(temporaryPath, { force: true });
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Could not write config to ${this.path}: ${reason}`, { cause: error });
    }
  }

  update(patch: Partial<Config>): Config {
    const next: Config = { ...this.load() };
    if (patch.devFolder !== undefined) next.devFolder = patch.devFolder;
    if (patch.ide !== undefined) next.ide = patch.ide;
    this.save(next);
    return next;
  }
}
