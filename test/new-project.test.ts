import { access, mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const promptState = vi.hoisted(() => ({
  CANCEL: Symbol("cancel"),
  textResponses: [] as Array<string | symbol>,
  selectResponses: [] as Array<string | symbol>,
  multiselectResponses: [] as Array<string[] | symbol>,
  confirmResponses: [] as Array<boolean | symbol>,
  validationErrors: [] as string[],
  textCalls: 0,
  selectCalls: 0,
  logs: [] as Array<{ level: string; message: string }>
}));

vi.mock("@clack/prompts", () => {
  function record(level: string) {
    return (message: string) => {
      promptState.logs.push({ level, message });
    };
  }

  async function text(options: { validate?: (value: string) => string | undefined }) {
    promptState.textCalls += 1;
    for (;;) {
      const next = promptState.textResponses.shift();
      if (next === undefined) throw new Error("No scripted text response left.");
      if (typeof next === "symbol") return next;
      const problem = options.validate?.(next);
      if (!problem) return next;
      promptState.validationErrors.push(problem);
    }
  }

  async function select(options: { initialValue?: string }) {
    promptState.selectCalls += 1;
    return promptState.selectResponses.shift() ?? options.initialValue;
  }

  async function multiselect(options: { initialValues?: string[] }) {
    return promptState.multiselectResponses.shift() ?? options.initialValues ?? [];
  }

  async function confirm(options: { initialValue?: boolean }) {
    return promptState.confirmResponses.shift() ?? options.initialValue ?? false;
  }

  return {
    text,
    select,
    multiselect,
    confirm,
    log: {
      info: record("info"),
      warn: record("warn"),
      error: record("error"),
      success: record("success"),
      message: record("message")
    },
    spinner: () => ({
      start: () => undefined,
      message: () => undefined,
      stop: () => undefined
    }),
    isCancel: (value: unknown) => value === promptState.CANCEL,
    cancel: record("cancel"),
    outro: record("outro")
  };
});

import { runNewProject } from "../src/commands/new-project.js";
import { OperationCancelledError, UnknownTemplateError, UserInputError } from "../src/core/errors.js";
import { collectProjectRequest } from "../src/core/prompts.js";
import type { Config } from "../src/core/types.js";

describe("collectProjectRequest", () => {
  let rootDir: string;
  let config: Config;

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), "flow-request-"));
    config = { devFolder: rootDir, ide: "cursor" };
    promptState.textResponses = [];
    promptState.selectResponses = [];
    promptState.multiselectResponses = [];
    promptState.confirmResponses = [];
    promptState.validationErrors = [];
    promptState.textCalls = 0;
    promptState.selectCalls = 0;
    promptState.logs = [];
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it("re-prompts for an invalid name and collects template and features", async () => {
    promptState.textResponses = ["bad name", "shop"];
    promptState.selectResponses = ["fastapi"];
    promptState.multiselectResponses = [["sqlalchemy", "alembic"]];

    const request = await collectProjectRequest(undefined, {}, config);

    expect(promptState.validationErrors).toEqual(["Use letters, digits, '.', '_' or '-' and start with a letter or digit."]);
    expect(request).toEqual({
      projectName: "shop",
      templateId: "fastapi",
      features: new Set(["sqlalchemy", "alembic"]),
      targetDir: join(rootDir, "shop"),
      overwrite: false,
      openInEditor: true,
      initializeGit: false
    });
  });

  it("skips prompts that flags already answer", async () => {
    const request = await collectProjectRequest("api", { template: "express", feature: ["docker"], dir: join(rootDir, "elsewhere") }, config);

    expect(promptState.textCalls).toBe(0);
    expect(promptState.selectCalls).toBe(0);
    expect(request.templateId).toBe("express");
    expect(request.features).toEqual(new Set(["docker"]));
    expect(request.targetDir).toBe(join(rootDir, "elsewhere", "api"));
  });

  it("asks before replacing an existing directory and stops when declined", async () => {
    await mkdir(join(rootDir, "taken"));
    await writeFile(join(rootDir, "taken", "keep.txt"), "keep\n");
    promptState.confirmResponses = [false];

    await expect(collectProjectRequest("taken", { template: "python" }, config)).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(await readFile(join(rootDir, "taken", "keep.txt"), "utf8")).toBe("keep\n");
  });

  it("treats a confirmed replacement like --force", async () => {
    await mkdir(join(rootDir, "taken"));
    promptState.confirmResponses = [true];

    const request = await collectProjectRequest("taken", { template: "python", feature: [] }, config);
    expect(request.overwrite).toBe(true);
    expect(request.features).toEqual(new Set());
  });

  it("aborts when a prompt is cancelled", async () => {
    promptState.textResponses = ["shop"];
    promptState.selectResponses = [promptState.CANCEL];

    await expect(collectProjectRequest(undefined, {}, config)).rejects.toMatchObject({
      name: "OperationCancelledError",
      reported: true
    });
    expect(promptState.logs).toContainEqual({ level: "cancel", message: "Project creation canceled." });
  });

  it("uses defaults with --yes", async () => {
    const request = await collectProjectRequest("web", { yes: true }, { devFolder: rootDir, ide: "none" });

    expect(request).toEqual({
      projectName: "web",
      templateId: "react",
      features: new Set(["typescript"]),
      targetDir: join(rootDir, "web"),
      overwrite: false,
      openInEditor: false,
      initializeGit: false
    });
    expect(Object.isFrozen(request)).toBe(true);
    expect(() => Object.assign(request, { overwrite: true })).toThrow(TypeError);
  });

  it("requires a valid name with --yes", async () => {
    await expect(collectProjectRequest(undefined, { yes: true }, config)).rejects.toThrow(
      "A project name is required with --yes."
    );
    await expect(collectProjectRequest("../up", { yes: true }, config)).rejects.toBeInstanceOf(UserInputError);
  });

  it("refuses an existing directory with --yes unless forced", async () => {
    await mkdir(join(rootDir, "taken"));

    await expect(collectProjectRequest("taken", { yes: true }, config)).rejects.toThrow(
      `Target directory already exists: ${join(rootDir, "taken")}. Use --force to replace it.`
    );
    const forced = await collectProjectRequest("taken", { yes: true, force: true }, config);
    expect(forced.overwrite).toBe(true);
  });

  it("rejects feature ids the template does not declare", async () => {
    await expect(collectProjectRequest("web", { yes: true, template: "react", feature: ["mongodb"] }, config)).rejects.toBeInstanceOf(
      UserInputError
    );
  });
});

describe("runNewProject", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), "flow-new-"));
    promptState.logs = [];
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it("generates the project and reports a summary", async () => {
    await runNewProject(
      "demo-api",
      { yes: true, template: "express", feature: ["typescript", "testing"], dir: rootDir, open: false },
      { config: { devFolder: "~/unused", ide: "cursor" } }
    );

    await access(join(rootDir, "demo-api", "src", "app.ts"));
    await access(join(rootDir, "demo-api", "tests", "app.test.ts"));
    const messages = promptState.logs.map((entry) => `${entry.level}: ${entry.message}`);
    expect(messages).toContain("info: Generated 11 files. Features: typescript, testing.");
    expect(messages).toContain("info: Skipped git initialization.");
    expect(messages.some((message) => message.startsWith("success: Created Express project at"))).toBe(true);
  });

  it("fails on an unknown template without creating anything", async () => {
    await expect(
      runNewProject("legacy", { yes: true, template: "rails", dir: rootDir }, { config: { devFolder: rootDir, ide: "none" } })
    ).rejects.toBeInstanceOf(UnknownTemplateError);
    expect(await readdir(rootDir)).toEqual([]);
  });

  it("leaves no directory behind when generation is interrupted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      runNewProject(
        "stopped",
        { yes: true, template: "python", dir: rootDir },
        { config: { devFolder: rootDir, ide: "none" }, signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(await readdir(rootDir)).toEqual([]);
  });
});
