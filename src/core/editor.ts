import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";

const EDITOR_COMMANDS: Readonly<Record<string, string>> = {
  cursor: "cursor",
  vscode: "code",
  code: "code",
  zed: "zed",
  webstorm: "webstorm",
  sublime: "subl"
};

export type SpawnProcess = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface EditorLaunchResult {
  launched: boolean;
  command?: string;
  warning?: string;
}

/** Maps an `ide` config value to the executable to run; `none` or an empty value disables launching. */
export function resolveEditorCommand(ide: string): string | undefined {
  const value = ide.trim();
  const key = value.toLowerCase();
  if (!key || key === "none") return undefined;
  return EDITOR_COMMANDS[key] ?? value;
}

/**
 * Starts the editor detached from this process. Resolves once the child has spawned or failed to;
 * a launch failure is reported in the result, never thrown.
 */
export function openInEditor(path: string, ide: string, spawnProcess: SpawnProcess = spawn): Promise<EditorLaunchResult> {
  const command = resolveEditorCommand(ide);
  if (!command) return Promise.resolve({ launched: false });

  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawnProcess(command, [path], { detached: true, stdio: "ignore" });
    } catch (error) {
      resolve({ launched: false, command, warning: error instanceof Error ? error.message : String(error) });
      return;
    }

    child.once("spawn", () => {
      child.unref();
      resolve({ launched: true, command });
    });
    child.once("error", (error) => {
      resolve({ launched: false, command, warning: error.message });
    });
  });
}
