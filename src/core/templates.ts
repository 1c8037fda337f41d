import { UnknownTemplateError } from "./errors.js";
import { EXPRESS_FEATURES, generateExpressProject } from "./templates/express.js";
import { FASTAPI_FEATURES, generateFastapiProject } from "./templates/fastapi.js";
import { NEXTJS_FEATURES, generateNextjsProject } from "./templates/nextjs.js";
import { PYTHON_FEATURES, generatePythonProject } from "./templates/python.js";
import { REACT_FEATURES, generateReactProject } from "./templates/react.js";
import { REACT_SUPABASE_FEATURES, generateReactSupabaseProject } from "./templates/react-supabase.js";
import { T3_FEATURES, generateT3Project } from "./templates/t3.js";
import type { FileArtifact, GeneratorContext, ProjectRequest, TemplateDefinition, TemplateId } from "./types.js";
import { writeProjectTree, type WriteProjectTreeOptions } from "./write.js";

function freezeTemplate(template: TemplateDefinition): Readonly<TemplateDefinition> {
  return Object.freeze({
    ...template,
    features: Object.freeze(template.features.map((feature) => Object.freeze({ ...feature })))
  });
}

const CATALOG: TemplateDefinition[] = [
  {
    id: "react",
    displayName: "React",
    description: "Vite single-page app",
    category: "frontend",
    features: REACT_FEATURES,
    generate: generateReactProject
  },
  {
    id: "nextjs",
    displayName: "Next.js",
    description: "App Router application",
    category: "fullstack",
    features: NEXTJS_FEATURES,
    generate: generateNextjsProject
  },
  {
    id: "t3",
    displayName: "T3 Stack",
    description: "Next.js, tRPC and Tailwind with optional auth and Prisma",
    category: "fullstack",
    features: T3_FEATURES,
    generate: generateT3Project
  },
  {
    id: "react-supabase",
    displayName: "React + Supabase",
    description: "Vite app wired to a Supabase project",
    category: "fullstack",
    features: REACT_SUPABASE_FEATURES,
    generate: generateReactSupabaseProject
  },
  {
    id: "express",
    displayName: "Express",
    description: "Node HTTP API",
    category: "backend",
    features: EXPRESS_FEATURES,
    generate: generateExpressProject
  },
  {
    id: "fastapi",
    displayName: "FastAPI",
    description: "Async Python API service",
    category: "backend",
    features: FASTAPI_FEATURES,
    generate: generateFastapiProject
  },
  {
    id: "python",
    displayName: "Python",
    description: "Plain Python package with tooling",
    category: "python",
    features: PYTHON_FEATURES,
    generate: generatePythonProject
  }
];

const TEMPLATE_DEFINITIONS: readonly TemplateDefinition[] = Object.freeze(CATALOG.map(freezeTemplate));

export function listTemplates(): readonly TemplateDefinition[] {
  return TEMPLATE_DEFINITIONS;
}

export function isTemplateId(value: string): value is TemplateId {
  return TEMPLATE_DEFINITIONS.some((template) => template.id === value);
}

export function getTemplate(id: string): TemplateDefinition {
  const template = TEMPLATE_DEFINITIONS.find((entry) => entry.id === id);
  if (!template) {
    throw new UnknownTemplateError(
      id,
      TEMPLATE_DEFINITIONS.map((entry) => entry.id)
    );
  }
  return template;
}

/** Unknown feature ids are ignored here; callers validate selections up front. */
export function renderTemplate(template: TemplateDefinition, context: GeneratorContext): FileArtifact[] {
  const known = new Set(template.features.map((feature) => feature.id));
  const features = new Set(Array.from(context.features).filter((feature) => known.has(feature)));
  return template.generate({ projectName: context.projectName, features });
}

export interface GenerateProjectResult {
  targetDir: string;
  files: FileArtifact[];
  warnings: string[];
}

export async function generateProject(
  request: Pick<ProjectRequest, "projectName" | "templateId" | "features" | "targetDir">,
  options: WriteProjectTreeOptions = {}
): Promise<GenerateProjectResult> {
  const template = getTemplate(request.templateId);
  const files = renderTemplate(template, { projectName: request.projectName, features: request.features });
  const { warnings } = await writeProjectTree(request.targetDir, files, options);
  return { targetDir: request.targetDir, files, warnings };
}
