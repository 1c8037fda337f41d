export type { FeatureId, TemplateCategory, TemplateId } from "./types/common.js";
export type { FileArtifact } from "./types/artifacts.js";
export type { FeatureDefinition, GeneratorContext, TemplateDefinition, TemplateGenerator } from "./types/template.js";
export type { NewProjectCommandOptions, ProjectRequest } from "./types/project.js";
export type { Config, ConfigKey } from "./types/config.js";
