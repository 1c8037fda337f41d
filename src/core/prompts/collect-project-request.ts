import { join, resolve } from "node:path";

import { confirm, log, select, text } from "@clack/prompts";

import { expandHome, resolveDevFolder } from "../config.js";
import { OperationCancelledError, UserInputError } from "../errors.js";
import { getTemplate, listTemplates } from "../templates.js";
import { validateProjectName } from "../text.js";
import type { Config, FeatureId, NewProjectCommandOptions, ProjectRequest, TemplateDefinition, TemplateId } from "../types.js";
import { assertTargetAvailable, pathExists } from "../write.js";
import { defaultFeatures, resolveFeatureSelection, selectFeatures } from "./feature-selection.js";
import { unwrapPrompt } from "./interaction.js";

const DEFAULT_TEMPLATE_ID: TemplateId = "react";

function resolveBaseDirectory(options: NewProjectCommandOptions, config: Config): string {
  const dir = options.dir?.trim();
  return dir ? resolve(expandHome(dir)) : resolveDevFolder(config);
}

function requireValidName(value: string | undefined): string {
  const name = value?.trim() ?? "";
  const problem = validateProjectName(name);
  if (problem) {
    throw new UserInputError(name ? `Invalid project name "${name}": ${problem}` : "A project name is required with --yes.");
  }
  return name;
}

function buildRequest(
  base: { projectName: string; template: TemplateDefinition; features: Set<FeatureId>; baseDir: string; overwrite: boolean },
  options: NewProjectCommandOptions,
  config: Config
): ProjectRequest {
  return Object.freeze({
    projectName: base.projectName,
    templateId: base.template.id,
    features: new Set(base.features),
    targetDir: join(base.baseDir, base.projectName),
    overwrite: base.overwrite,
    openInEditor: options.open !== false && config.ide.trim().toLowerCase() !== "none",
    initializeGit: options.gitInit ?? false
  });
}

async function collectNonInteractive(
  nameArg: string | undefined,
  options: NewProjectCommandOptions,
  config: Config
): Promise<ProjectRequest> {
  const projectName = requireValidName(nameArg);
  const template = getTemplate(options.template?.trim() || DEFAULT_TEMPLATE_ID);
  const features = options.feature ? resolveFeatureSelection(template, options.feature) : defaultFeatures(template);
  const baseDir = resolveBaseDirectory(options, config);
  const overwrite = options.force ?? false;

  await assertTargetAvailable(join(baseDir, projectName), overwrite);
  return buildRequest({ projectName, template, features, baseDir, overwrite }, options, config);
}

async function promptProjectName(nameArg: string | undefined): Promise<string> {
  const provided = nameArg?.trim();
  if (provided) {
    const problem = validateProjectName(provided);
    if (!problem) return provided;
    log.warn(`Ignoring project name "${provided}": ${problem}`);
  }

  const value = unwrapPrompt<string>(
    await text({
      message: "Project name",
      placeholder: "my-app",
      validate(input) {
        return validateProjectName(input);
      }
    })
  );
  return value.trim();
}

async function promptTemplate(): Promise<TemplateDefinition> {
  const templateId = unwrapPrompt<TemplateId>(
    await select<TemplateId>({
      message: "Template",
      initialValue: DEFAULT_TEMPLATE_ID,
      options: listTemplates().map((template) => ({
        value: template.id,
        label: template.displayName,
        hint: `${template.category}: ${template.description}`
      }))
    })
  );
  return getTemplate(templateId);
}

async function confirmOverwrite(targetDir: string): Promise<void> {
  const overwrite = unwrapPrompt<boolean>(
    await confirm({
      message: `${targetDir} already exists. Replace it?`,
      initialValue: false
    })
  );
  if (!overwrite) {
    throw new OperationCancelledError("Project creation canceled; existing directory left untouched.");
  }
}

async function collectProjectRequest(
  nameArg: string | undefined,
  options: NewProjectCommandOptions,
  config: Config
): Promise<ProjectRequest> {
  if (options.yes) {
    return collectNonInteractive(nameArg, options, config);
  }

  const projectName = await promptProjectName(nameArg);
  const template = options.template?.trim() ? getTemplate(options.template.trim()) : await promptTemplate();
  const features = options.feature ? resolveFeatureSelection(template, options.feature) : await selectFeatures(template);
  const baseDir = resolveBaseDirectory(options, config);
  const targetDir = join(baseDir, projectName);

  let overwrite = options.force ?? false;
  if (!overwrite && (await pathExists(targetDir))) {
    await confirmOverwrite(targetDir);
    overwrite = true;
  }
  await assertTargetAvailable(targetDir, overwrite);

  return buildRequest({ projectName, template, features, baseDir, overwrite }, options, config);
}

export { collectProjectRequest, DEFAULT_TEMPLATE_ID };
