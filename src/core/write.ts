import { spawnSync } from "node:child_process";
import { mkdir, mkdtemp, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join, posix } from "node:path";

import { GenerationError, OperationCancelledError, UserInputError } from "./errors.js";
import type { FileArtifact } from "./types.js";

function normalize(path: string): string {
  return path.replaceAll("\\", "/");
}

export type ProjectWriteStage = "directories" | "files" | "commit";

export interface ProjectWriteProgress {
  stage: ProjectWriteStage;
  current: number;
  total: number;
  path: string;
}

export interface WriteProjectTreeOptions {
  force?: boolean;
  signal?: AbortSignal;
  onProgress?: (event: ProjectWriteProgress) => void;
}

export interface WriteProjectTreeResult {
  /** Problems that did not stop the new tree from landing, such as a leftover replaced directory. */
  warnings: string[];
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return false;
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function assertSafeRelativePath(path: string): string {
  const normalized = posix.normalize(normalize(path));
  if (normalized.startsWith("../") || normalized === ".." || posix.isAbsolute(normalized) || normalized === ".") {
    throw new GenerationError(`Refusing to write outside the project directory: ${path}`, path);
  }
  return normalized;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError("Generation canceled before completion.");
  }
}

export async function assertTargetAvailable(targetDir: string, force: boolean): Promise<void> {
  if (!(await pathExists(targetDir))) return;
  if (force) {
    const targetStats = await stat(targetDir);
    if (!targetStats.isDirectory()) {
      throw new UserInputError(`Target path exists and is not a directory: ${targetDir}`);
    }
    return;
  }
  throw new UserInputError(`Target directory already exists: ${targetDir}. Use --force to replace it.`);
}

function collectDirectories(files: FileArtifact[]): string[] {
  const directories = new Set<string>();
  for (const file of files) {
    let current = posix.dirname(file.path);
    while (current !== "." && current !== "") {
      directories.add(current);
      current = posix.dirname(current);
    }
  }
  return Array.from(directories).sort();
}

/**
 * Writes every artifact into a hidden staging directory beside `targetDir`, then renames it into place.
 * The target only ever appears complete; on failure or abort the staging directory is removed.
 */
export async function writeProjectTree(
  targetDir: string,
  files: FileArtifact[],
  options: WriteProjectTreeOptions = {}
): Promise<WriteProjectTreeResult> {
  const force = options.force ?? false;
  await assertTargetAvailable(targetDir, force);
  throwIfAborted(options.signal);

  const normalizedFiles = files.map((file) => ({ ...file, path: assertSafeRelativePath(file.path) }));
  const parentDir = dirname(targetDir);
  await mkdir(parentDir, { recursive: true });
  const stagingDir = await mkdtemp(join(parentDir, `.${basename(targetDir)}.partial-`));

  let currentPath = ".";
  try {
    const directories = collectDirectories(normalizedFiles);
    let createdDirectories = 0;
    for (const directory of directories) {
      currentPath = directory;
      throwIfAborted(options.signal);
      await mkdir(join(stagingDir, directory), { recursive: true });
      createdDirectories += 1;
      options.onProgress?.({
        stage: "directories",
        current: createdDirectories,
        total: directories.length,
        path: directory
      });
    }

    let writtenFiles = 0;
    for (const file of normalizedFiles) {
      currentPath = file.path;
      throwIfAborted(options.signal);
      await writeFile(join(stagingDir, file.path), file.content, { encoding: "utf8", flag: "wx" });
      writtenFiles += 1;
      options.onProgress?.({
        stage: "files",
        current: writtenFiles,
        total: normalizedFiles.length,
        path: file.path
      });
    }

    throwIfAborted(options.signal);
    currentPath = ".";
    const cleanupWarning = await commitStagingDirectory(stagingDir, targetDir, force);
    options.onProgress?.({ stage: "commit", current: 1, total: 1, path: basename(targetDir) });
    return { warnings: cleanupWarning ? [cleanupWarning] : [] };
  } catch (error) {
    await rm(stagingDir, { recursive: true, force: true });
    if (error instanceof GenerationError || error instanceof OperationCancelledError || error instanceof UserInputError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new GenerationError(`Failed to write \`${currentPath}\`: ${reason}`, currentPath, { cause: error });
  }
}

/** Resolves with a warning when the replaced directory could not be removed after the swap. */
async function commitStagingDirectory(stagingDir: string, targetDir: string, force: boolean): Promise<string | undefined> {
  if (!(await pathExists(targetDir))) {
    await rename(stagingDir, targetDir);
    return undefined;
  }
  if (!force) {
    throw new UserInputError(`Target directory appeared during generation: ${targetDir}`);
  }

  const previousDir = `${stagingDir}.previous`;
  await rename(targetDir, previousDir);
  try {
    await rename(stagingDir, targetDir);
  } catch (error) {
    await rename(previousDir, targetDir);
    throw error;
  }
  try {
    await rm(previousDir, { recursive: true, force: true });
    return undefined;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return `Replaced directory could not be removed from \`${previousDir}\`: ${reason}`;
  }
}

export function ensureGitInit(targetDir: string): { initialized: boolean; warning?: string } {
  const result = spawnSync("git", ["init"], {
    cwd: targetDir,
    encoding: "utf8"
  });

  if (result.error) {
    return { initialized: false, warning: result.error.message };
  }

  if (result.status !== 0) {
    return {
      initialized: false,
      warning: (result.stderr || result.stdout || "git init failed").trim()
    };
  }

  return { initialized: true };
}
