import { ChildProcess } from "node:child_process";

import { describe, expect, it, vi } from "vitest";

import { openInEditor, resolveEditorCommand } from "../src/core/editor.js";

describe("resolveEditorCommand", () => {
  it("maps known editor ids to their commands", () => {
    expect(resolveEditorCommand("cursor")).toBe("cursor");
    expect(resolveEditorCommand("vscode")).toBe("code");
    expect(resolveEditorCommand("code")).toBe("code");
    expect(resolveEditorCommand("zed")).toBe("zed");
    expect(resolveEditorCommand("webstorm")).toBe("webstorm");
    expect(resolveEditorCommand("Sublime")).toBe("subl");
  });

  it("disables launching for none or an empty value", () => {
    expect(resolveEditorCommand("none")).toBeUndefined();
    expect(resolveEditorCommand("  ")).toBeUndefined();
  });

  it("uses unknown ids as the command name", () => {
    expect(resolveEditorCommand(" nvim-qt ")).toBe("nvim-qt");
  });
});

describe("openInEditor", () => {
  it("spawns the editor detached and resolves once it starts", async () => {
    const child = new ChildProcess();
    const unref = vi.spyOn(child, "unref").mockImplementation(() => undefined);
    const spawnProcess = vi.fn(() => child);

    const pending = openInEditor("/work/demo", "vscode", spawnProcess);
    child.emit("spawn");

    await expect(pending).resolves.toEqual({ launched: true, command: "code" });
    expect(spawnProcess).toHaveBeenCalledWith("code", ["/work/demo"], { detached: true, stdio: "ignore" });
    expect(unref).toHaveBeenCalledTimes(1);
  });

  it("reports spawn errors as a warning instead of failing", async () => {
    const child = new ChildProcess();
    const spawnProcess = vi.fn(() => child);

    const pending = openInEditor("/work/demo", "zed", spawnProcess);
    child.emit("error", new Error("spawn zed ENOENT"));

    await expect(pending).resolves.toEqual({ launched: false, command: "zed", warning: "spawn zed ENOENT" });
  });

  it("does not spawn anything when the editor is disabled", async () => {
    const spawnProcess = vi.fn(() => new ChildProcess());

    await expect(openInEditor("/work/demo", "none", spawnProcess)).resolves.toEqual({ launched: false });
    expect(spawnProcess).not.toHaveBeenCalled();
  });
});
