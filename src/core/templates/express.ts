import { formatJson, normalizeContent, toKebabCase } from "../text.js";
import type { FeatureDefinition, FileArtifact, GeneratorContext } from "../types.js";
import {
  buildNodeGitignore,
  buildNodePackageJson,
  buildPrettierConfig,
  buildReadme,
  compactArtifacts,
  hasFeature,
  scriptExtension,
  type PackageName
} from "./shared.js";

export const EXPRESS_FEATURES: readonly FeatureDefinition[] = [
  { id: "typescript", label: "TypeScript", description: "Compile with tsc, run in dev with tsx", defaultEnabled: true },
  { id: "cors", label: "CORS", description: "cors middleware with an allow-list from env", defaultEnabled: true },
  { id: "eslint", label: "ESLint", description: "Recommended lint rules for Node", defaultEnabled: false },
  { id: "prettier", label: "Prettier", description: "Opinionated code formatting", defaultEnabled: false },
  { id: "testing", label: "Vitest + Supertest", description: "HTTP-level tests against the app", defaultEnabled: false },
  { id: "docker", label: "Docker", description: "Multi-stage Dockerfile", defaultEnabled: false }
];

function buildExpressPackageJson(context: GeneratorContext): string {
  const typed = hasFeature(context, "typescript");
  const eslint = hasFeature(context, "eslint");
  const prettier = hasFeature(context, "prettier");

  const scripts: Record<string, string> = typed
    ? { dev: "tsx watch src/server.ts", build: "tsc", start: "node dist/server.js" }
    : { dev: "node --watch src/server.js", start: "node src/server.js" };
  if (hasFeature(context, "testing")) scripts.test = "vitest run";
  if (eslint) scripts.lint = "eslint src";
  if (prettier) scripts.format = "prettier --write .";

  const dependencies: PackageName[] = ["express", "dotenv"];
  const devDependencies: PackageName[] = [];
  if (typed) devDependencies.push("typescript", "tsx", "@types/node", "@types/express");
  if (hasFeature(context, "cors")) {
    dependencies.push("cors");
    if (typed) devDependencies.push("@types/cors");
  }
  if (hasFeature(context, "testing")) {
    devDependencies.push("vitest", "supertest");
    if (typed) devDependencies.push("@types/supertest");
  }
  if (eslint) {
    devDependencies.push("eslint");
    if (typed) devDependencies.push("@typescript-eslint/parser", "@typescript-eslint/eslint-plugin");
  }
  if (prettier) {
    devDependencies.push("prettier");
    if (eslint) devDependencies.push("eslint-config-prettier");
  }

  return buildNodePackageJson({
    name: toKebabCase(context.projectName) || "express-api",
    type: "module",
    scripts,
    dependencies,
    devDependencies
  });
}

function buildExpressTsconfig(): string {
  return formatJson({
    compilerOptions: {
      target: "ES2022",
      module: "NodeNext",
      moduleResolution: "NodeNext",
      outDir: "dist",
      rootDir: "src",
      strict: true,
      esModuleInterop: true,
      skipLibCheck: true
    },
    include: ["src"]
  });
}

function buildAppModule(context: GeneratorContext): string {
  const typed = hasFeature(context, "typescript");
  const cors = hasFeature(context, "cors");
  const corsImport = cors ? `import cors from "cors";\n` : "";
  const corsSetup = cors
    ? `
const allowedOrigins = (process.env.CORS_ORIGINS ?? "").split(",").filter(Boolean);
app.use(cors(allowedOrigins.length > 0 ? { origin: allowedOrigins } : undefined));`
    : "";
  return normalizeContent(`import express from "express";
${corsImport}
import { errorHandler } from "./middleware/error-handler.js";
import { healthRouter } from "./routes/health.js";

export const app = express();
${corsSetup}
app.use(express.json());

app.use("/health", healthRouter);

app.get("/", (_req${typed ? ": express.Request" : ""}, res${typed ? ": express.Response" : ""}) => {
  res.json({ message: "Welcome to ${context.projectName}" });
});

app.use(errorHandler);
`);
}

function buildServerModule(): string {
  return normalizeContent(`import "dotenv/config";

import { app } from "./app.js";

const port = Number(process.env.PORT ?? 3000);

app.listen(port, () => {
  console.log(\`Server listening on http://localhost:\${port}\`);
});
`);
}

function buildHealthRouter(): string {
  return normalizeContent(`import { Router } from "express";

export const healthRouter = Router();

healthRouter.get("/", (_req, res) => {
  res.json({ status: "ok" });
});
`);
}

function buildErrorHandler(context: GeneratorContext): string {
  if (hasFeature(context, "typescript")) {
    return normalizeContent(`import type { NextFunction, Request, Response } from "express";

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const message = error instanceof Error ? error.message : "Internal Server Error";
  console.error(error);
  res.status(500).json({ error: message });
}
`);
  }
  return normalizeContent(`export function errorHandler(error, _req, res, _next) {
  const message = error instanceof Error ? error.message : "Internal Server Error";
  console.error(error);
  res.status(500).json({ error: message });
}
`);
}

function buildEnvExample(context: GeneratorContext): string {
  return normalizeContent(["PORT=3000", ...(hasFeature(context, "cors") ? ["CORS_ORIGINS=http://localhost:5173"] : [])].join("\n"));
}

function buildExpressEslintConfig(context: GeneratorContext): string {
  const typed = hasFeature(context, "typescript");
  return formatJson({
    root: true,
    env: { node: true, es2022: true },
    extends: [
      "eslint:recommended",
      ...(typed ? ["plugin:@typescript-eslint/recommended"] : []),
      ...(hasFeature(context, "prettier") ? ["prettier"] : [])
    ],
    ...(typed ? { parser: "@typescript-eslint/parser", plugins: ["@typescript-eslint"] } : {}),
    parserOptions: { ecmaVersion: "latest", sourceType: "module" }
  });
}

function buildVitestConfig(): string {
  return normalizeContent(`import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.*"],
  },
});
`);
}

function buildAppTest(): string {
  return normalizeContent(`import request from "supertest";
import { describe, expect, it } from "vitest";

import { app } from "../src/app.js";

describe("app", () => {
  it("reports health", async () => {
    const response = await request(app).get("/health");
    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "ok" });
  });
});
`);
}

function buildDockerfile(context: GeneratorContext): string {
  if (hasFeature(context, "typescript")) {
    return normalizeContent(`FROM node:20-alpine AS build
WORKDIR /app
COPY package*.json ./
RUN npm ci
COPY . .
RUN npm run build

FROM node:20-alpine
WORKDIR /app
ENV NODE_ENV=production
COPY package*.json ./
RUN npm ci --omit=dev
COPY --from=build /app/dist ./dist
EXPOSE 3000
CMD ["node", "dist/server.js"]
`);
  }
  return normalizeContent(`FROM node:20-alpine
WORKDIR /app
ENV NODE_ENV=production
COPY package*.json ./
RUN npm ci --omit=dev
COPY src ./src
EXPOSE 3000
CMD ["node", "src/server.js"]
`);
}

function buildExpressReadme(context: GeneratorContext): string {
  const sections = [
    { title: "Getting Started", body: "```bash\nnpm install\ncp .env.example .env\nnpm run dev\n```" },
    {
      title: "Endpoints",
      body: "- `GET /`: welcome message\n- `GET /health`: liveness check"
    },
    ...(hasFeature(context, "docker")
      ? [{ title: "Docker", body: `\`\`\`bash\ndocker build -t ${toKebabCase(context.projectName) || "express-api"} .\n\`\`\`` }]
      : [])
  ];
  return buildReadme(context.projectName, "Express HTTP API.", sections);
}

export function generateExpressProject(context: GeneratorContext): FileArtifact[] {
  const ext = scriptExtension(context);
  const testing = hasFeature(context, "testing");
  const docker = hasFeature(context, "docker");

  return compactArtifacts([
    { path: "README.md", content: buildExpressReadme(context) },
    { path: ".gitignore", content: buildNodeGitignore() },
    { path: "package.json", content: buildExpressPackageJson(context) },
    { path: ".env.example", content: buildEnvExample(context) },
    hasFeature(context, "typescript") ? { path: "tsconfig.json", content: buildExpressTsconfig() } : null,
    { path: `src/app.${ext}`, content: buildAppModule(context) },
    { path: `src/server.${ext}`, content: buildServerModule() },
    { path: `src/routes/health.${ext}`, content: buildHealthRouter() },
    { path: `src/middleware/error-handler.${ext}`, content: buildErrorHandler(context) },
    hasFeature(context, "eslint") ? { path: ".eslintrc.json", content: buildExpressEslintConfig(context) } : null,
    hasFeature(context, "prettier") ? { path: ".prettierrc", content: buildPrettierConfig() } : null,
    testing ? { path: `vitest.config.${ext}`, content: buildVitestConfig() } : null,
    testing ? { path: `tests/app.test.${ext}`, content: buildAppTest() } : null,
    docker ? { path: "Dockerfile", content: buildDockerfile(context) } : null,
    docker ? { path: ".dockerignore", content: "node_modules\ndist\n.env\n" } : null
  ]);
}
