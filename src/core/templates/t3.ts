import { formatJson, normalizeContent, toKebabCase, toTitleCase } from "../text.js";
import type { FeatureDefinition, FileArtifact, GeneratorContext } from "../types.js";
import {
  buildNodeGitignore,
  buildNodePackageJson,
  buildPostcssConfig,
  buildPwaManifest,
  buildReadme,
  buildTailwindConfig,
  compactArtifacts,
  hasFeature,
  type PackageName
} from "./shared.js";

export const T3_FEATURES: readonly FeatureDefinition[] = [
  { id: "nextauth", label: "NextAuth.js", description: "Session auth wired into the tRPC context", defaultEnabled: false },
  { id: "prisma", label: "Prisma", description: "Prisma ORM with a SQLite development database", defaultEnabled: false },
  { id: "pwa", label: "PWA", description: "next-pwa service worker and web manifest", defaultEnabled: false },
  { id: "jest", label: "Jest", description: "Jest + Testing Library with jsdom", defaultEnabled: false },
  {
    id: "trpc-subscriptions",
    label: "tRPC subscriptions",
    description: "WebSocket server and client link for subscriptions",
    defaultEnabled: false
  }
];

function buildT3PackageJson(context: GeneratorContext): string {
  const scripts: Record<string, string> = {
    dev: "next dev",
    build: "next build",
    start: "next start",
    typecheck: "tsc --noEmit"
  };
  const dependencies: PackageName[] = [
    "next",
    "react",
    "react-dom",
    "@trpc/server",
    "@trpc/client",
    "@trpc/react-query",
    "@tanstack/react-query",
    "@t3-oss/env-nextjs",
    "superjson",
    "zod"
  ];
  const devDependencies: PackageName[] = [
    "typescript",
    "@types/node",
    "@types/react",
    "@types/react-dom",
    "tailwindcss",
    "postcss",
    "autoprefixer"
  ];

  if (hasFeature(context, "nextauth")) {
    dependencies.push("next-auth");
    if (hasFeature(context, "prisma")) dependencies.push("@auth/prisma-adapter");
  }
  if (hasFeature(context, "prisma")) {
    dependencies.push("@prisma/client");
    devDependencies.push("prisma");
    scripts["db:push"] = "prisma db push";
    scripts["db:studio"] = "prisma studio";
    scripts.postinstall = "prisma generate";
  }
  if (hasFeature(context, "pwa")) dependencies.push("next-pwa");
  if (hasFeature(context, "jest")) {
    devDependencies.push(
      "jest",
      "jest-environment-jsdom",
      "ts-jest",
      "@types/jest",
      "@testing-library/react",
      "@testing-library/jest-dom"
    );
    scripts.test = "jest";
  }
  if (hasFeature(context, "trpc-subscriptions")) {
    dependencies.push("ws");
    devDependencies.push("@types/ws", "tsx");
    scripts["dev:ws"] = "tsx watch src/server/ws-server.ts";
  }

  return buildNodePackageJson({
    name: toKebabCase(context.projectName) || "t3-app",
    type: "module",
    scripts,
    dependencies,
    devDependencies
  });
}

function buildT3NextConfig(context: GeneratorContext): string {
  const header = `import "./src/env.js";\n`;
  if (hasFeature(context, "pwa")) {
    return normalizeContent(`${header}import withPWAInit from "next-pwa";

const withPWA = withPWAInit({
  dest: "public",
  disable: process.env.NODE_ENV === "development",
});

/** @type {import("next").NextConfig} */
const config = {};

export default withPWA(config);
`);
  }
  return normalizeContent(`${header}
/** @type {import("next").NextConfig} */
const config = {};

export default config;
`);
}

function buildT3Tsconfig(): string {
  return formatJson({
    compilerOptions: {
      target: "es2022",
      lib: ["dom", "dom.iterable", "es2022"],
      allowJs: true,
      checkJs: true,
      skipLibCheck: true,
      strict: true,
      noUncheckedIndexedAccess: true,
      noEmit: true,
      esModuleInterop: true,
      module: "ESNext",
      moduleResolution: "Bundler",
      resolveJsonModule: true,
      isolatedModules: true,
      jsx: "preserve",
      incremental: true,
      plugins: [{ name: "next" }],
      baseUrl: ".",
      paths: { "~/*": ["./src/*"] }
    },
    include: ["next-env.d.ts", "**/*.ts", "**/*.tsx", "**/*.cjs", "**/*.js", ".next/types/**/*.ts"],
    exclude: ["node_modules"]
  });
}

function buildEnvModule(context: GeneratorContext): string {
  const serverVars: string[] = [`    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),`];
  const runtimeVars: string[] = ["    NODE_ENV: process.env.NODE_ENV,"];
  if (hasFeature(context, "prisma")) {
    serverVars.push("    DATABASE_URL: z.string().url(),");
    runtimeVars.push("    DATABASE_URL: process.env.DATABASE_URL,");
  }
  if (hasFeature(context, "nextauth")) {
    serverVars.push(
      `    NEXTAUTH_SECRET: process.env.NODE_ENV === "production" ? z.string() : z.string().optional(),`,
      "    NEXTAUTH_URL: z.string().url().optional(),",
      "    DISCORD_CLIENT_ID: z.string(),",
      "    DISCORD_CLIENT_SECRET: z.string(),"
    );
    runtimeVars.push(
      "    NEXTAUTH_SECRET: process.env.NEXTAUTH_SECRET,",
      "    NEXTAUTH_URL: process.env.NEXTAUTH_URL,",
      "    DISCORD_CLIENT_ID: process.env.DISCORD_CLIENT_ID,",
      "    DISCORD_CLIENT_SECRET: process.env.DISCORD_CLIENT_SECRET,"
    );
  }
  return normalizeContent(`import { createEnv } from "@t3-oss/env-nextjs";
import { z } from "zod";

export const env = createEnv({
  server: {
${serverVars.join("\n")}
  },
  client: {},
  runtimeEnv: {
${runtimeVars.join("\n")}
  },
  skipValidation: !!process.env.SKIP_ENV_VALIDATION,
  emptyStringAsUndefined: true,
});
`);
}

function buildEnvExample(context: GeneratorContext): string {
  const lines = ["# Copy to .env and fill in values."];
  if (hasFeature(context, "prisma")) lines.push('DATABASE_URL="file:./db.sqlite"');
  if (hasFeature(context, "nextauth")) {
    lines.push('NEXTAUTH_SECRET=""', 'NEXTAUTH_URL="http://localhost:3000"', 'DISCORD_CLIENT_ID=""', 'DISCORD_CLIENT_SECRET=""');
  }
  return normalizeContent(lines.join("\n"));
}

function buildTrpcInit(context: GeneratorContext): string {
  const auth = hasFeature(context, "nextauth");
  const prisma = hasFeature(context, "prisma");
  const imports = [
    `import { initTRPC${auth ? ", TRPCError" : ""} } from "@trpc/server";`,
    `import superjson from "superjson";`,
    `import { ZodError } from "zod";`,
    ...(auth ? [`import { getServerAuthSession } from "~/server/auth";`] : []),
    ...(prisma ? [`import { db } from "~/server/db";`] : [])
  ];
  const contextFields = [
    ...(prisma ? ["    db,"] : []),
    ...(auth ? ["    session: await getServerAuthSession(),"] : []),
    "    ...opts,"
  ];
  const protectedProcedure = auth
    ? `

export const protectedProcedure = t.procedure.use(({ ctx, next }) => {
  if (!ctx.session?.user) {
    throw new TRPCError({ code: "UNAUTHORIZED" });
  }
  return next({ ctx: { session: { ...ctx.session, user: ctx.session.user } } });
});`
    : "";

  return normalizeContent(`${imports.join("\n")}

export const createTRPCContext = async (opts: { headers: Headers }) => {
  return {
${contextFields.join("\n")}
  };
};

const t = initTRPC.context<typeof createTRPCContext>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        zodError: error.cause instanceof ZodError ? error.cause.flatten() : null,
      },
    };
  },
});

export const createCallerFactory = t.createCallerFactory;
export const createTRPCRouter = t.router;
export const publicProcedure = t.procedure;${protectedProcedure}
`);
}

function buildRootRouter(): string {
  return normalizeContent(`import { postRouter } from "~/server/api/routers/post";
import { createCallerFactory, createTRPCRouter } from "~/server/api/trpc";

export const appRouter = createTRPCRouter({
  post: postRouter,
});

export type AppRouter = typeof appRouter;

export const createCaller = createCallerFactory(appRouter);
`);
}

function buildPostRouter(): string {
  return normalizeContent(`import { z } from "zod";

import { createTRPCRouter, publicProcedure } from "~/server/api/trpc";

export const postRouter = createTRPCRouter({
  hello: publicProcedure.input(z.object({ text: z.string() })).query(({ input }) => {
    return { greeting: \`Hello \${input.text}\` };
  }),
});
`);
}

function buildTrpcRouteHandler(): string {
  return normalizeContent(`import { fetchRequestHandler } from "@trpc/server/adapters/fetch";
import { type NextRequest } from "next/server";

import { appRouter } from "~/server/api/root";
import { createTRPCContext } from "~/server/api/trpc";

const handler = (req: NextRequest) =>
  fetchRequestHandler({
    endpoint: "/api/trpc",
    req,
    router: appRouter,
    createContext: () => createTRPCContext({ headers: req.headers }),
  });

export { handler as GET, handler as POST };
`);
}

function buildTrpcReactProvider(): string {
  return normalizeContent(`"use client";

import { QueryClient, QueryClientProvider } from "@tanstack/react-query";
import { httpBatchLink } from "@trpc/client";
import { createTRPCReact } from "@trpc/react-query";
import { useState, type ReactNode } from "react";
import superjson from "superjson";

import { type AppRouter } from "~/server/api/root";

export const api = createTRPCReact<AppRouter>();

function getBaseUrl() {
  if (typeof window !== "undefined") return window.location.origin;
  return \`http://localhost:\${process.env.PORT ?? 3000}\`;
}

export function TRPCReactProvider({ children }: { children: ReactNode }) {
  const [queryClient] = useState(() => new QueryClient());
  const [trpcClient] = useState(() =>
    api.createClient({
      links: [
        httpBatchLink({
          transformer: superjson,
          url: getBaseUrl() + "/api/trpc",
        }),
      ],
    }),
  );

  return (
    <QueryClientProvider client={queryClient}>
      <api.Provider client={trpcClient} queryClient={queryClient}>
        {children}
      </api.Provider>
    </QueryClientProvider>
  );
}
`);
}

function buildT3Layout(context: GeneratorContext): string {
  const manifestLine = hasFeature(context, "pwa") ? `\n  manifest: "/manifest.json",` : "";
  return normalizeContent(`import "~/styles/globals.css";

import { type Metadata } from "next";

import { TRPCReactProvider } from "~/trpc/react";

export const metadata: Metadata = {
  title: "${toTitleCase(context.projectName)}",
  description: "Generated T3 application",${manifestLine}
};

export default function RootLayout({ children }: Readonly<{ children: React.ReactNode }>) {
  return (
    <html lang="en">
      <body>
        <TRPCReactProvider>{children}</TRPCReactProvider>
      </body>
    </html>
  );
}
`);
}

function buildT3Page(context: GeneratorContext): string {
  return normalizeContent(`export default function HomePage() {
  return (
    <main className="flex min-h-screen flex-col items-center justify-center gap-4">
      <h1 className="text-5xl font-extrabold tracking-tight">${context.projectName}</h1>
      <p className="text-lg">Edit src/app/page.tsx to get started.</p>
    </main>
  );
}
`);
}

function buildAuthModule(context: GeneratorContext): string {
  const prisma = hasFeature(context, "prisma");
  const adapterImports = prisma ? `import { PrismaAdapter } from "@auth/prisma-adapter";\n` : "";
  const dbImport = prisma ? `import { db } from "~/server/db";\n` : "";
  const adapterLine = prisma ? `\n  adapter: PrismaAdapter(db) as NextAuthOptions["adapter"],` : "";
  return normalizeContent(`${adapterImports}import { getServerSession, type DefaultSession, type NextAuthOptions } from "next-auth";
import DiscordProvider from "next-auth/providers/discord";

import { env } from "~/env";
${dbImport}
declare module "next-auth" {
  interface Session extends DefaultSession {
    user: DefaultSession["user"] & { id: string };
  }
}

export const authOptions: NextAuthOptions = {
  callbacks: {
    session: ({ session, token }) => ({
      ...session,
      user: { ...session.user, id: token.sub ?? "" },
    }),
  },${adapterLine}
  providers: [
    DiscordProvider({
      clientId: env.DISCORD_CLIENT_ID,
      clientSecret: env.DISCORD_CLIENT_SECRET,
    }),
  ],
};

export const getServerAuthSession = () => getServerSession(authOptions);
`);
}

function buildAuthRouteHandler(): string {
  return normalizeContent(`import NextAuth from "next-auth";

import { authOptions } from "~/server/auth";

const handler = NextAuth(authOptions);

export { handler as GET, handler as POST };
`);
}

function buildPrismaSchema(context: GeneratorContext): string {
  const authModels = hasFeature(context, "nextauth")
    ? `

model Account {
  id                String  @id @default(cuid())
  userId            String
  type              String
  provider          String
  providerAccountId String
  refresh_token     String?
  access_token      String?
  expires_at        Int?
  token_type        String?
  scope             String?
  id_token          String?
  session_state     String?
  user              User    @relation(fields: [userId], references: [id], onDelete: Cascade)

  @@unique([provider, providerAccountId])
}

model Session {
  id           String   @id @default(cuid())
  sessionToken String   @unique
  userId       String
  expires      DateTime
  user         User     @relation(fields: [userId], references: [id], onDelete: Cascade)
}

model User {
  id            String    @id @default(cuid())
  name          String?
  email         String?   @unique
  emailVerified DateTime?
  image         String?
  accounts      Account[]
  sessions      Session[]
}`
    : "";
  return normalizeContent(`generator client {
  provider = "prisma-client-js"
}

datasource db {
  provider = "sqlite"
  url      = env("DATABASE_URL")
}

model Post {
  id        Int      @id @default(autoincrement())
  name      String
  createdAt DateTime @default(now())
  updatedAt DateTime @updatedAt
}${authModels}
`);
}

function buildDbModule(): string {
  return normalizeContent(`import { PrismaClient } from "@prisma/client";

import { env } from "~/env";

const createPrismaClient = () =>
  new PrismaClient({
    log: env.NODE_ENV === "development" ? ["query", "error", "warn"] : ["error"],
  });

const globalForPrisma = globalThis as unknown as {
  prisma: ReturnType<typeof createPrismaClient> | undefined;
};

export const db = globalForPrisma.prisma ?? createPrismaClient();

if (env.NODE_ENV !== "production") globalForPrisma.prisma = db;
`);
}

function buildJestConfig(): string {
  return normalizeContent(`/** @type {import('ts-jest').JestConfigWithTsJest} */
const config = {
  preset: "ts-jest",
  testEnvironment: "jsdom",
  moduleNameMapper: {
    "^~/(.*)$": "<rootDir>/src/$1",
  },
  setupFilesAfterEnv: ["<rootDir>/src/test/setup.ts"],
};

export default config;
`);
}

function buildWsServer(): string {
  return normalizeContent(`import { applyWSSHandler } from "@trpc/server/adapters/ws";
import { WebSocketServer } from "ws";

import { appRouter } from "~/server/api/root";
import { createTRPCContext } from "~/server/api/trpc";

const port = Number(process.env.WS_PORT ?? 3001);
const wss = new WebSocketServer({ port });

const handler = applyWSSHandler({
  wss,
  router: appRouter,
  createContext: () => createTRPCContext({ headers: new Headers() }),
});

console.log(\`tRPC WebSocket server listening on ws://localhost:\${port}\`);

process.on("SIGTERM", () => {
  handler.broadcastReconnectNotification();
  wss.close();
});
`);
}

function buildWsClientLink(): string {
  return normalizeContent(`import { createWSClient, wsLink } from "@trpc/client";
import superjson from "superjson";

import { type AppRouter } from "~/server/api/root";

function getWsUrl() {
  if (typeof window !== "undefined") {
    return \`ws://\${window.location.hostname}:\${process.env.NEXT_PUBLIC_WS_PORT ?? 3001}\`;
  }
  return \`ws://localhost:\${process.env.WS_PORT ?? 3001}\`;
}

export function createSubscriptionLink() {
  return wsLink<AppRouter>({
    client: createWSClient({ url: getWsUrl() }),
    transformer: superjson,
  });
}
`);
}

function buildT3Readme(context: GeneratorContext): string {
  const steps = ["npm install", ...(hasFeature(context, "prisma") ? ["npm run db:push"] : []), "npm run dev"];
  const sections = [
    { title: "Getting Started", body: `Copy \`.env.example\` to \`.env\`, then:\n\n\`\`\`bash\n${steps.join("\n")}\n\`\`\`` },
    {
      title: "Stack",
      body: [
        "- Next.js App Router with TypeScript",
        "- tRPC with superjson",
        "- Tailwind CSS",
        ...(hasFeature(context, "nextauth") ? ["- NextAuth.js (Discord provider)"] : []),
        ...(hasFeature(context, "prisma") ? ["- Prisma (SQLite)"] : []),
        ...(hasFeature(context, "trpc-subscriptions") ? ["- tRPC subscriptions over WebSocket (`npm run dev:ws`)"] : [])
      ].join("\n")
    }
  ];
  return buildReadme(context.projectName, "Full-stack T3 application.", sections);
}

export function generateT3Project(context: GeneratorContext): FileArtifact[] {
  const nextauth = hasFeature(context, "nextauth");
  const prisma = hasFeature(context, "prisma");
  const jest = hasFeature(context, "jest");
  const subscriptions = hasFeature(context, "trpc-subscriptions");

  return compactArtifacts([
    { path: "README.md", content: buildT3Readme(context) },
    { path: ".gitignore", content: buildNodeGitignore([".next/", "out/", "next-env.d.ts", "*.sqlite"]) },
    { path: "package.json", content: buildT3PackageJson(context) },
    { path: ".env.example", content: buildEnvExample(context) },
    { path: "next.config.js", content: buildT3NextConfig(context) },
    { path: "tsconfig.json", content: buildT3Tsconfig() },
    { path: "tailwind.config.ts", content: buildTailwindConfig(["./src/**/*.tsx"], true) },
    { path: "postcss.config.js", content: buildPostcssConfig() },
    { path: "src/env.js", content: buildEnvModule(context) },
    { path: "src/styles/globals.css", content: "@tailwind base;\n@tailwind components;\n@tailwind utilities;\n" },
    { path: "src/app/layout.tsx", content: buildT3Layout(context) },
    { path: "src/app/page.tsx", content: buildT3Page(context) },
    { path: "src/app/api/trpc/[trpc]/route.ts", content: buildTrpcRouteHandler() },
    { path: "src/server/api/trpc.ts", content: buildTrpcInit(context) },
    { path: "src/server/api/root.ts", content: buildRootRouter() },
    { path: "src/server/api/routers/post.ts", content: buildPostRouter() },
    { path: "src/trpc/react.tsx", content: buildTrpcReactProvider() },
    nextauth ? { path: "src/server/auth.ts", content: buildAuthModule(context) } : null,
    nextauth ? { path: "src/app/api/auth/[...nextauth]/route.ts", content: buildAuthRouteHandler() } : null,
    prisma ? { path: "prisma/schema.prisma", content: buildPrismaSchema(context) } : null,
    prisma ? { path: "src/server/db.ts", content: buildDbModule() } : null,
    hasFeature(context, "pwa") ? { path: "public/manifest.json", content: buildPwaManifest(toTitleCase(context.projectName)) } : null,
    jest ? { path: "jest.config.js", content: buildJestConfig() } : null,
    jest ? { path: "src/test/setup.ts", content: 'import "@testing-library/jest-dom";\n' } : null,
    subscriptions ? { path: "src/server/ws-server.ts", content: buildWsServer() } : null,
    subscriptions ? { path: "src/utils/ws.ts", content: buildWsClientLink() } : null
  ]);
}
