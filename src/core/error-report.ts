import { log } from "@clack/prompts";
import { CommanderError } from "commander";

import { normalizeError } from "./errors.js";

/**
 * Logs a top-level failure once and returns the exit code to set, or `undefined` when commander
 * finished normally (help, version). Commander prints its own parse errors.
 */
export function reportCliError(error: unknown): number | undefined {
  if (error instanceof CommanderError && error.exitCode === 0) return undefined;
  const normalized = normalizeError(error);
  if (!(error instanceof CommanderError) && !normalized.reported) {
    log.error(normalized.message);
  }
  return normalized.exitCode;
}
