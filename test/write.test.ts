import { access, mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const fsState = vi.hoisted(() => ({ failPreviousRemoval: false }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    rm: async (...args: Parameters<typeof actual.rm>) => {
      const [path] = args;
      if (fsState.failPreviousRemoval && String(path).endsWith(".previous")) {
        throw new Error("EBUSY: resource busy or locked");
      }
      return actual.rm(...args);
    }
  };
});

import { GenerationError, OperationCancelledError, UserInputError } from "../src/core/errors.js";
import type { ProjectWriteProgress } from "../src/core/write.js";
import { pathExists, writeProjectTree } from "../src/core/write.js";

describe("writeProjectTree", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), "flow-write-"));
  });

  afterEach(async () => {
    fsState.failPreviousRemoval = false;
    await rm(rootDir, { recursive: true, force: true });
  });

  it("emits progress events for directories, files and the final commit", async () => {
    const targetDir = join(rootDir, "demo");
    const events: ProjectWriteProgress[] = [];

    await writeProjectTree(
      targetDir,
      [
        { path: "README.md", content: "# Demo\n" },
        { path: "src/lib/index.ts", content: "export const ok = true;\n" }
      ],
      {
        onProgress(event) {
          events.push(event);
        }
      }
    );

    expect(events).toEqual([
      { stage: "directories", current: 1, total: 2, path: "src" },
      { stage: "directories", current: 2, total: 2, path: "src/lib" },
      { stage: "files", current: 1, total: 2, path: "README.md" },
      { stage: "files", current: 2, total: 2, path: "src/lib/index.ts" },
      { stage: "commit", current: 1, total: 1, path: "demo" }
    ]);
    expect(await readFile(join(targetDir, "src/lib/index.ts"), "utf8")).toBe("export const ok = true;\n");
    expect(await readdir(rootDir)).toEqual(["demo"]);
  });

  it("refuses an existing target without force", async () => {
    const targetDir = join(rootDir, "demo");
    await mkdir(targetDir);
    await writeFile(join(targetDir, "keep.txt"), "keep\n");

    await expect(writeProjectTree(targetDir, [{ path: "README.md", content: "# New\n" }])).rejects.toBeInstanceOf(
      UserInputError
    );
    expect(await readFile(join(targetDir, "keep.txt"), "utf8")).toBe("keep\n");
    expect(await readdir(rootDir)).toEqual(["demo"]);
  });

  it("replaces an existing target with force", async () => {
    const targetDir = join(rootDir, "demo");
    await mkdir(targetDir);
    await writeFile(join(targetDir, "old.txt"), "old\n");

    await writeProjectTree(targetDir, [{ path: "README.md", content: "# New\n" }], { force: true });

    expect(await readdir(targetDir)).toEqual(["README.md"]);
    expect(await readdir(rootDir)).toEqual(["demo"]);
  });

  it("leaves neither target nor staging directory when a write fails", async () => {
    const targetDir = join(rootDir, "demo");

    const failure = writeProjectTree(targetDir, [
      { path: "README.md", content: "# Demo\n" },
      { path: "README.md", content: "# Duplicate\n" }
    ]);

    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toMatchObject({ path: "README.md" });
    expect(await pathExists(targetDir)).toBe(false);
    expect(await readdir(rootDir)).toEqual([]);
  });

  it("keeps the previous directory when a forced replacement fails", async () => {
    const targetDir = join(rootDir, "demo");
    await mkdir(targetDir);
    await writeFile(join(targetDir, "old.txt"), "old\n");

    await expect(
      writeProjectTree(
        targetDir,
        [
          { path: "a.txt", content: "a\n" },
          { path: "a.txt", content: "again\n" }
        ],
        { force: true }
      )
    ).rejects.toBeInstanceOf(GenerationError);

    expect(await readdir(targetDir)).toEqual(["old.txt"]);
    expect(await readdir(rootDir)).toEqual(["demo"]);
  });

  it("reports a leftover replaced directory as a warning once the new tree is in place", async () => {
    const targetDir = join(rootDir, "demo");
    await mkdir(targetDir);
    await writeFile(join(targetDir, "old.txt"), "old\n");
    fsState.failPreviousRemoval = true;

    const result = await writeProjectTree(targetDir, [{ path: "README.md", content: "# New\n" }], { force: true });

    expect(await readdir(targetDir)).toEqual(["README.md"]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatch(/^Replaced directory could not be removed from `.+\.previous`: EBUSY: resource busy or locked$/);
    const leftovers = (await readdir(rootDir)).filter((entry) => entry !== "demo");
    expect(leftovers).toHaveLength(1);
    expect(leftovers[0]).toMatch(/^\.demo\.partial-.+\.previous$/);
  });

  it("returns no warnings after a clean write", async () => {
    const result = await writeProjectTree(join(rootDir, "demo"), [{ path: "README.md", content: "# Demo\n" }]);

    expect(result).toEqual({ warnings: [] });
  });

  it("rejects paths that escape the project directory", async () => {
    const targetDir = join(rootDir, "demo");

    await expect(writeProjectTree(targetDir, [{ path: "../escape.txt", content: "x\n" }])).rejects.toThrow(
      "Refusing to write outside the project directory: ../escape.txt"
    );
    await expect(access(join(rootDir, "escape.txt"))).rejects.toThrow();
    expect(await readdir(rootDir)).toEqual([]);
  });

  it("cancels cleanly when the signal is already aborted", async () => {
    const targetDir = join(rootDir, "demo");
    const controller = new AbortController();
    controller.abort();

    await expect(
      writeProjectTree(targetDir, [{ path: "README.md", content: "# Demo\n" }], { signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(await readdir(rootDir)).toEqual([]);
  });

  it("cancels between files and removes the staging directory", async () => {
    const targetDir = join(rootDir, "demo");
    const controller = new AbortController();

    await expect(
      writeProjectTree(
        targetDir,
        [
          { path: "one.txt", content: "1\n" },
          { path: "two.txt", content: "2\n" }
        ],
        {
          signal: controller.signal,
          onProgress(event) {
            if (event.stage === "files" && event.current === 1) controller.abort();
          }
        }
      )
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(await readdir(rootDir)).toEqual([]);
  });
});
