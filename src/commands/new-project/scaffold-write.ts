import { log, spinner } from "@clack/prompts";

import { generateProject } from "../../core/templates.js";
import type { ProjectRequest } from "../../core/types.js";
import { ensureGitInit } from "../../core/write.js";

interface WriteProjectOptions {
  request: ProjectRequest;
  displayPath: string;
  signal?: AbortSignal;
}

export interface WriteProjectSummary {
  fileCount: number;
  gitSummary: string;
}

export async function writeNewProject(options: WriteProjectOptions): Promise<WriteProjectSummary> {
  const buildSpinner = spinner();
  buildSpinner.start(`Generating project in \`${options.displayPath}\`...`);

  let gitSummary = "Skipped git initialization.";

  try {
    const result = await generateProject(options.request, {
      force: options.request.overwrite,
      ...(options.signal ? { signal: options.signal } : {}),
      onProgress(event) {
        if (event.stage === "directories") {
          buildSpinner.message(`Creating folders ${event.current}/${event.total}: ${event.path}`);
          return;
        }
        if (event.stage === "files") {
          buildSpinner.message(`Writing files ${event.current}/${event.total}: ${event.path}`);
          return;
        }
        buildSpinner.message("Moving project into place...");
      }
    });

    if (options.request.initializeGit) {
      buildSpinner.message("Initializing git repository...");
      const gitResult = ensureGitInit(options.request.targetDir);
      if (gitResult.initialized) {
        gitSummary = "Initialized git repository.";
      } else {
        gitSummary = `Could not initialize git repository (${gitResult.warning ?? "unknown error"}).`;
        log.warn(gitSummary);
      }
    }

    buildSpinner.stop("Project generated.");
    for (const warning of result.warnings) {
      log.warn(warning);
    }
    return { fileCount: result.files.length, gitSummary };
  } catch (error) {
    buildSpinner.stop("Project generation failed.", 2);
    throw error;
  }
}
