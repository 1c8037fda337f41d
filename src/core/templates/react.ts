import { formatJson, normalizeContent, toKebabCase } from "../text.js";
import type { FeatureDefinition, FileArtifact, GeneratorContext } from "../types.js";
import {
  buildNodeGitignore,
  buildNodePackageJson,
  buildPostcssConfig,
  buildPrettierConfig,
  buildReadme,
  buildTailwindConfig,
  compactArtifacts,
  hasFeature,
  scriptExtension,
  type PackageName
} from "./shared.js";

export const REACT_FEATURES: readonly FeatureDefinition[] = [
  { id: "typescript", label: "TypeScript", description: "Typed components and a strict tsconfig", defaultEnabled: true },
  { id: "tailwind", label: "Tailwind CSS", description: "Utility-first styling with PostCSS", defaultEnabled: false },
  { id: "eslint", label: "ESLint", description: "Lint rules for React and hooks", defaultEnabled: false },
  { id: "prettier", label: "Prettier", description: "Opinionated code formatting", defaultEnabled: false }
];

export interface ReactPackageExtras {
  dependencies?: readonly PackageName[];
  devDependencies?: readonly PackageName[];
}

function buildReactPackageJson(context: GeneratorContext, extras: ReactPackageExtras): string {
  const typed = hasFeature(context, "typescript");
  const eslint = hasFeature(context, "eslint");
  const prettier = hasFeature(context, "prettier");
  const sourceGlob = typed ? "ts,tsx" : "js,jsx";

  const scripts: Record<string, string> = {
    dev: "vite",
    build: typed ? "tsc -b && vite build" : "vite build",
    preview: "vite preview"
  };
  if (eslint) {
    scripts.lint = `eslint src --ext ${sourceGlob} --report-unused-disable-directives --max-warnings 0`;
  }
  if (prettier) {
    scripts.format = `prettier --write "src/**/*.{${sourceGlob},css}"`;
  }

  const devDependencies: PackageName[] = ["vite", "@vitejs/plugin-react"];
  if (typed) devDependencies.push("typescript", "@types/react", "@types/react-dom");
  if (hasFeature(context, "tailwind")) devDependencies.push("tailwindcss", "postcss", "autoprefixer");
  if (eslint) {
    devDependencies.push("eslint", "eslint-plugin-react", "eslint-plugin-react-hooks", "eslint-plugin-react-refresh");
    if (typed) devDependencies.push("@typescript-eslint/parser", "@typescript-eslint/eslint-plugin");
  }
  if (prettier) {
    devDependencies.push("prettier");
    if (eslint) devDependencies.push("eslint-config-prettier");
  }

  return buildNodePackageJson({
    name: toKebabCase(context.projectName) || "react-app",
    type: "module",
    scripts,
    dependencies: ["react", "react-dom", ...(extras.dependencies ?? [])],
    devDependencies: [...devDependencies, ...(extras.devDependencies ?? [])]
  });
}

function buildIndexHtml(context: GeneratorContext): string {
  return normalizeContent(`<!doctype html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>${context.projectName}</title>
  </head>
  <body>
    <div id="root"></div>
    <script type="module" src="/src/main.${scriptExtension(context, true)}"></script>
  </body>
</html>
`);
}

function buildViteConfig(): string {
  return normalizeContent(`import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
});
`);
}

function buildReactTsconfig(): string {
  return formatJson({
    compilerOptions: {
      target: "ES2020",
      useDefineForClassFields: true,
      lib: ["ES2020", "DOM", "DOM.Iterable"],
      module: "ESNext",
      skipLibCheck: true,
      moduleResolution: "bundler",
      allowImportingTsExtensions: true,
      isolatedModules: true,
      moduleDetection: "force",
      noEmit: true,
      jsx: "react-jsx",
      strict: true,
      noUnusedLocals: true,
      noUnusedParameters: true,
      noFallthroughCasesInSwitch: true
    },
    include: ["src"]
  });
}

function buildMainEntry(context: GeneratorContext): string {
  const rootLookup = hasFeature(context, "typescript")
    ? `document.getElementById("root")!`
    : `document.getElementById("root")`;
  return normalizeContent(`import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import App from "./App";
import "./index.css";

createRoot(${rootLookup}).render(
  <StrictMode>
    <App />
  </StrictMode>,
);
`);
}

function buildAppComponent(context: GeneratorContext): string {
  const tailwind = hasFeature(context, "tailwind");
  const mainClass = tailwind ? ` className="flex min-h-screen flex-col items-center justify-center gap-4"` : ` className="app"`;
  const headingClass = tailwind ? ` className="text-4xl font-bold"` : "";
  return normalizeContent(`import { useState } from "react";

export default function App() {
  const [count, setCount] = useState(0);

  return (
    <main${mainClass}>
      <h1${headingClass}>${context.projectName}</h1>
      <button type="button" onClick={() => setCount((value) => value + 1)}>
        Clicked {count} times
      </button>
    </main>
  );
}
`);
}

function buildIndexCss(context: GeneratorContext): string {
  if (hasFeature(context, "tailwind")) {
    return normalizeContent(`@tailwind base;
@tailwind components;
@tailwind utilities;
`);
  }
  return normalizeContent(`:root {
  font-family: system-ui, sans-serif;
  line-height: 1.5;
}

body {
  margin: 0;
}

.app {
  display: flex;
  min-height: 100vh;
  flex-direction: column;
  align-items: center;
  justify-content: center;
  gap: 1rem;
}
`);
}

function buildReactEslintConfig(context: GeneratorContext): string {
  const typed = hasFeature(context, "typescript");
  const extendsList = [
    "eslint:recommended",
    "plugin:react/recommended",
    "plugin:react/jsx-runtime",
    "plugin:react-hooks/recommended",
    ...(typed ? ["plugin:@typescript-eslint/recommended"] : []),
    ...(hasFeature(context, "prettier") ? ["prettier"] : [])
  ];
  return formatJson({
    root: true,
    env: { browser: true, es2021: true },
    extends: extendsList,
    ...(typed ? { parser: "@typescript-eslint/parser" } : {}),
    parserOptions: {
      ecmaFeatures: { jsx: true },
      ecmaVersion: "latest",
      sourceType: "module"
    },
    plugins: ["react", "react-refresh", ...(typed ? ["@typescript-eslint"] : [])],
    settings: { react: { version: "detect" } },
    rules: {
      "react-refresh/only-export-components": ["warn", { allowConstantExport: true }]
    }
  });
}

function buildReactReadme(context: GeneratorContext, summary: string): string {
  const sections = [
    {
      title: "Getting Started",
      body: "```bash\nnpm install\nnpm run dev\n```"
    },
    {
      title: "Scripts",
      body: [
        "- `npm run dev`: start the Vite dev server.",
        "- `npm run build`: produce a production bundle in `dist/`.",
        "- `npm run preview`: serve the production bundle locally.",
        ...(hasFeature(context, "eslint") ? ["- `npm run lint`: lint sources with ESLint."] : []),
        ...(hasFeature(context, "prettier") ? ["- `npm run format`: format sources with Prettier."] : [])
      ].join("\n")
    }
  ];
  return buildReadme(context.projectName, summary, sections);
}

export interface ReactBaseOptions {
  summary: string;
  packageExtras?: ReactPackageExtras;
  gitignoreExtras?: readonly string[];
}

/** Vite + React baseline shared by the plain React and React + Supabase templates. */
export function buildReactBaseFiles(context: GeneratorContext, options: ReactBaseOptions): FileArtifact[] {
  const typed = hasFeature(context, "typescript");
  const tailwind = hasFeature(context, "tailwind");
  const jsxExt = scriptExtension(context, true);
  const configExt = scriptExtension(context);

  return compactArtifacts([
    { path: "README.md", content: buildReactReadme(context, options.summary) },
    { path: ".gitignore", content: buildNodeGitignore(options.gitignoreExtras) },
    { path: "package.json", content: buildReactPackageJson(context, options.packageExtras ?? {}) },
    { path: "index.html", content: buildIndexHtml(context) },
    { path: `vite.config.${configExt}`, content: buildViteConfig() },
    typed ? { path: "tsconfig.json", content: buildReactTsconfig() } : null,
    typed ? { path: "src/vite-env.d.ts", content: '/// <reference types="vite/client" />\n' } : null,
    { path: `src/main.${jsxExt}`, content: buildMainEntry(context) },
    { path: `src/App.${jsxExt}`, content: buildAppComponent(context) },
    { path: "src/index.css", content: buildIndexCss(context) },
    tailwind
      ? { path: "tailwind.config.js", content: buildTailwindConfig(["./index.html", "./src/**/*.{js,ts,jsx,tsx}"], false) }
      : null,
    tailwind ? { path: "postcss.config.js", content: buildPostcssConfig() } : null,
    hasFeature(context, "eslint") ? { path: ".eslintrc.json", content: buildReactEslintConfig(context) } : null,
    hasFeature(context, "prettier") ? { path: ".prettierrc", content: buildPrettierConfig() } : null
  ]);
}

export function generateReactProject(context: GeneratorContext): FileArtifact[] {
  return buildReactBaseFiles(context, {
    summary: "React single-page application built with Vite."
  });
}
