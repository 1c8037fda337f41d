import { formatJson, normalizeContent } from "../text.js";
import type { FeatureId, FileArtifact, GeneratorContext } from "../types.js";
import packageVersions from "./package-versions.json" with { type: "json" };

export type PackageName = keyof typeof packageVersions;

export function hasFeature(context: GeneratorContext, feature: FeatureId): boolean {
  return context.features.has(feature);
}

export function scriptExtension(context: GeneratorContext, jsx = false): string {
  const typed = hasFeature(context, "typescript");
  if (jsx) return typed ? "tsx" : "jsx";
  return typed ? "ts" : "js";
}

export function dependencyRange(name: PackageName): string {
  return packageVersions[name];
}

function toDependencyMap(names: readonly PackageName[]): Record<string, string> {
  const unique = Array.from(new Set(names)).sort();
  return Object.fromEntries(unique.map((name) => [name, dependencyRange(name)]));
}

interface NodePackageManifest {
  name: string;
  type?: "module" | "commonjs";
  scripts: Record<string, string>;
  dependencies: readonly PackageName[];
  devDependencies: readonly PackageName[];
}

export function buildNodePackageJson(manifest: NodePackageManifest): string {
  return formatJson({
    name: manifest.name,
    version: "0.1.0",
    private: true,
    ...(manifest.type ? { type: manifest.type } : {}),
    scripts: manifest.scripts,
    dependencies: toDependencyMap(manifest.dependencies),
    devDependencies: toDependencyMap(manifest.devDependencies)
  });
}

export function buildNodeGitignore(extraEntries: readonly string[] = []): string {
  return normalizeContent(
    [
      "node_modules/",
      "dist/",
      "coverage/",
      ".env",
      ".env.local",
      "*.log",
      ".DS_Store",
      ...extraEntries
    ].join("\n")
  );
}

export function buildPythonGitignore(): string {
  return normalizeContent(`__pycache__/
*.py[cod]
.venv/
venv/
.env
.pytest_cache/
.mypy_cache/
dist/
build/
*.egg-info/
.DS_Store
`);
}

export function buildPrettierConfig(plugins: readonly string[] = []): string {
  return formatJson({
    semi: true,
    trailingComma: "es5",
    singleQuote: true,
    tabWidth: 2,
    useTabs: false,
    ...(plugins.length > 0 ? { plugins } : {})
  });
}

export function buildTailwindConfig(contentGlobs: readonly string[], typed: boolean): string {
  const globs = contentGlobs.map((glob) => `    "${glob}",`).join("\n");
  if (typed) {
    return normalizeContent(`import type { Config } from "tailwindcss";

export default {
  content: [
${globs}
  ],
  theme: {
    extend: {},
  },
  plugins: [],
} satisfies Config;
`);
  }
  return normalizeContent(`/** @type {import('tailwindcss').Config} */
export default {
  content: [
${globs}
  ],
  theme: {
    extend: {},
  },
  plugins: [],
};
`);
}

export function buildPostcssConfig(): string {
  return normalizeContent(`export default {
  plugins: {
    tailwindcss: {},
    autoprefixer: {},
  },
};
`);
}

export function buildPwaManifest(appName: string): string {
  return formatJson({
    name: appName,
    short_name: appName,
    description: `${appName} progressive web app`,
    start_url: "/",
    display: "standalone",
    background_color: "#ffffff",
    theme_color: "#000000",
    icons: [
      { src: "/icon-192x192.png", sizes: "192x192", type: "image/png" },
      { src: "/icon-512x512.png", sizes: "512x512", type: "image/png" }
    ]
  });
}

interface ReadmeSection {
  title: string;
  body: string;
}

export function buildReadme(projectName: string, summary: string, sections: readonly ReadmeSection[]): string {
  const rendered = sections.map((section) => `## ${section.title}\n\n${section.body.trim()}`).join("\n\n");
  return normalizeContent(`# ${projectName}

${summary}

${rendered}
`);
}

/** Drops `null` entries so generators can list conditional artifacts inline. */
export function compactArtifacts(files: ReadonlyArray<FileArtifact | null>): FileArtifact[] {
  return files.filter((file): file is FileArtifact => file !== null);
}
