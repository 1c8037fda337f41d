import { relative } from "node:path";

import { log, outro } from "@clack/prompts";

import { collectProjectRequest } from "../core/prompts.js";
import { getTemplate } from "../core/templates.js";
import type { Config, NewProjectCommandOptions } from "../core/types.js";
import { launchEditor } from "./new-project/editor-launch.js";
import { writeNewProject } from "./new-project/scaffold-write.js";

function toDisplayPath(path: string): string {
  const rel = relative(process.cwd(), path);
  if (!rel) return ".";
  return rel.startsWith("..") ? path : rel;
}

interface NewProjectContext {
  config: Config;
  signal?: AbortSignal;
}

export async function runNewProject(
  nameArg: string | undefined,
  options: NewProjectCommandOptions,
  context: NewProjectContext
): Promise<void> {
  const request = await collectProjectRequest(nameArg, options, context.config);
  const template = getTemplate(request.templateId);
  const displayPath = toDisplayPath(request.targetDir);

  const summary = await writeNewProject({
    request,
    displayPath,
    ...(context.signal ? { signal: context.signal } : {})
  });

  log.success(`Created ${template.displayName} project at \`${displayPath}\`.`);
  const features = Array.from(request.features);
  log.info(`Generated ${summary.fileCount} files. Features: ${features.length > 0 ? features.join(", ") : "none"}.`);
  log.info(summary.gitSummary);
  if (request.overwrite) {
    log.warn("Replaced the existing directory.");
  }

  if (request.openInEditor) {
    await launchEditor(request.targetDir, context.config.ide);
  }

  outro(`Next: cd ${displayPath}`);
}
