import { log } from "@clack/prompts";

import { openInEditor, type SpawnProcess } from "../../core/editor.js";

export async function launchEditor(targetDir: string, ide: string, spawnProcess?: SpawnProcess): Promise<void> {
  const result = await openInEditor(targetDir, ide, spawnProcess);
  if (result.launched) {
    log.info(`Opened in ${result.command ?? ide}.`);
    return;
  }
  if (result.warning) {
    log.warn(`Could not open ${result.command ?? ide}: ${result.warning}`);
  }
}
