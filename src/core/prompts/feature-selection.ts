import { multiselect } from "@clack/prompts";

import { UserInputError } from "../errors.js";
import type { FeatureId, TemplateDefinition } from "../types.js";
import { unwrapPrompt } from "./interaction.js";

function defaultFeatures(template: TemplateDefinition): Set<FeatureId> {
  return new Set(template.features.filter((feature) => feature.defaultEnabled).map((feature) => feature.id));
}

/** Accepts repeated `--feature` values as well as comma-separated lists. */
function resolveFeatureSelection(template: TemplateDefinition, requested: readonly string[]): Set<FeatureId> {
  const known = new Set(template.features.map((feature) => feature.id));
  const normalized = requested
    .flatMap((value) => value.split(","))
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean);

  const unknown = Array.from(new Set(normalized.filter((value) => !known.has(value))));
  if (unknown.length > 0) {
    const valid = template.features.length > 0 ? Array.from(known).join(", ") : "none";
    throw new UserInputError(
      `Unknown feature${unknown.length > 1 ? "s" : ""} for ${template.displayName}: ${unknown.join(", ")}. Valid features: ${valid}.`
    );
  }

  return new Set(normalized);
}

async function selectFeatures(template: TemplateDefinition): Promise<Set<FeatureId>> {
  if (template.features.length === 0) return new Set();

  const selected = unwrapPrompt<FeatureId[]>(
    await multiselect<FeatureId>({
      message: `Features for ${template.displayName} (space to toggle)`,
      options: template.features.map((feature) => ({
        value: feature.id,
        label: feature.label,
        hint: feature.description
      })),
      initialValues: Array.from(defaultFeatures(template)),
      required: false
    })
  );

  return new Set(selected);
}

export { defaultFeatures, resolveFeatureSelection, selectFeatures };
