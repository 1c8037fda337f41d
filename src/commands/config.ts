import { log } from "@clack/prompts";

import { ConfigStore, normalizeConfigKey, resolveDevFolder } from "../core/config.js";
import { UserInputError } from "../core/errors.js";
import type { Config } from "../core/types.js";

export function runConfigShow(store: ConfigStore): Config {
  const config = store.load();
  log.info(`Config file: ${store.path}`);
  log.message([`dev_folder: ${config.devFolder} (${resolveDevFolder(config)})`, `ide: ${config.ide}`].join("\n"));
  return config;
}

export function runConfigSet(store: ConfigStore, rawKey: string, rawValue: string): Config {
  const key = normalizeConfigKey(rawKey);
  const value = rawValue.trim();
  if (!value) {
    throw new UserInputError(`A value is required for ${rawKey}.`);
  }

  const patch: Partial<Config> = {};
  patch[key] = value;
  const next = store.update(patch);
  log.success(`Saved ${key === "devFolder" ? "dev_folder" : key} = ${value}`);
  return next;
}

export function runConfigPath(store: ConfigStore): string {
  console.log(store.path);
  return store.path;
}
