export { collectProjectRequest, DEFAULT_TEMPLATE_ID } from "./prompts/collect-project-request.js";
export { defaultFeatures, resolveFeatureSelection, selectFeatures } from "./prompts/feature-selection.js";
export { unwrapPrompt } from "./prompts/interaction.js";
