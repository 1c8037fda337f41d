import type { FileArtifact } from "./artifacts.js";
import type { FeatureId, TemplateCategory, TemplateId } from "./common.js";

export interface FeatureDefinition {
  id: FeatureId;
  label: string;
  description: string;
  defaultEnabled: boolean;
}

export interface GeneratorContext {
  projectName: string;
  features: ReadonlySet<FeatureId>;
}

/**
 * Renders a template into file artifacts. Implementations must be pure: the same
 * context always yields the same paths, order and content.
 */
export type TemplateGenerator = (context: GeneratorContext) => FileArtifact[];

export interface TemplateDefinition {
  id: TemplateId;
  displayName: string;
  description: string;
  category: TemplateCategory;
  features: readonly FeatureDefinition[];
  generate: TemplateGenerator;
}
