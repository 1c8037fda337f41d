import { homedir } from "node:os";

import { Command } from "commander";

import { runConfigPath, runConfigSet, runConfigShow } from "./commands/config.js";
import { runNewProject } from "./commands/new-project.js";
import { ConfigStore, resolveDevFolder } from "./core/config.js";
import { reportCliError } from "./core/error-report.js";
import { listTemplates } from "./core/templates.js";
import type { NewProjectCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

const program = new Command();
const CLI_VERSION = packageJson.version;

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  borderGray: "\u001B[38;5;245m",
  mutedGray: "\u001B[38;5;250m",
  white: "\u001B[97m",
  cyan: "\u001B[38;5;44m"
} as const;

const COLOR_ENABLED = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";

function paint(text: string, ...codes: string[]): string {
  if (!COLOR_ENABLED || text.length === 0) return text;
  return `${codes.join("")}${text}${ANSI.reset}`;
}

function compactPath(path: string): string {
  const home = homedir();
  return path.startsWith(home) ? `~${path.slice(home.length)}` : path;
}

function ellipsize(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (text.length <= maxWidth) return text;
  if (maxWidth <= 1) return "…";
  const head = Math.max(1, Math.floor((maxWidth - 1) * 0.7));
  const tail = Math.max(0, maxWidth - 1 - head);
  return `${text.slice(0, head)}…${text.slice(text.length - tail)}`;
}

function renderHeader(devFolder: string): void {
  const terminalWidth = process.stdout.columns ?? 80;
  const innerWidth = Math.min(60, Math.max(30, terminalWidth - 4));

  const rows = [
    { plain: "flow", styled: (text: string) => paint(text, ANSI.bold, ANSI.cyan) },
    { plain: "Project scaffolding", styled: (text: string) => paint(text, ANSI.white) },
    { plain: `version:   v${CLI_VERSION}`, styled: (text: string) => paint(text, ANSI.mutedGray) },
    { plain: `projects:  ${compactPath(devFolder)}`, styled: (text: string) => paint(text, ANSI.mutedGray) }
  ];

  const vertical = paint("│", ANSI.borderGray);
  console.log(paint(`╭${"─".repeat(innerWidth + 2)}╮`, ANSI.borderGray));
  for (const row of rows) {
    const fitted = ellipsize(row.plain, innerWidth);
    const padding = " ".repeat(Math.max(0, innerWidth - fitted.length));
    console.log(`${vertical} ${row.styled(fitted)}${padding} ${vertical}`);
  }
  console.log(paint(`╰${"─".repeat(innerWidth + 2)}╯`, ANSI.borderGray));
  console.log("");
}

const configStore = new ConfigStore();
const abortController = new AbortController();

function handleInterrupt(): void {
  abortController.abort();
}

program
  .name("flow")
  .description("Scaffold new projects from React, Next.js, T3, Supabase, Express, FastAPI and Python templates.")
  .version(CLI_VERSION)
  .exitOverride();

const newCommand = program.command("new").description("Create something new.");

newCommand
  .command("project")
  .description("Create a project from a template.")
  .argument("[name]", "Project name (also the directory name)")
  .option("-t, --template <id>", `Template id: ${listTemplates()
    .map((template) => template.id)
    .join(" | ")}`)
  .option("-f, --feature <id...>", "Feature ids to enable (repeatable or comma-separated)")
  .option("--dir <path>", "Parent directory (defaults to the configured dev_folder)")
  .option("--no-open", "Do not open the project in the configured editor")
  .option("--git-init", "Run git init in the new project", false)
  .option("-y, --yes", "Use defaults and skip interactive prompts")
  .option("--force", "Replace the target directory if it already exists")
  .action(async (nameArg: string | undefined, rawOptions: NewProjectCommandOptions) => {
    const config = configStore.load();
    renderHeader(rawOptions.dir ?? resolveDevFolder(config));
    await runNewProject(nameArg, rawOptions, { config, signal: abortController.signal });
  });

const configCommand = program.command("config").description("View or change flow settings.");

configCommand
  .command("show")
  .description("Print the resolved configuration.")
  .action(() => {
    runConfigShow(configStore);
  });

configCommand
  .command("set")
  .description("Persist a setting (dev_folder or ide).")
  .argument("<key>", "dev_folder | ide")
  .argument("<value>", "New value")
  .action((key: string, value: string) => {
    runConfigSet(configStore, key, value);
  });

configCommand
  .command("path")
  .description("Print the config file location.")
  .action(() => {
    runConfigPath(configStore);
  });

async function main(): Promise<void> {
  process.once("SIGINT", handleInterrupt);
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const exitCode = reportCliError(error);
    if (exitCode !== undefined) process.exitCode = exitCode;
  } finally {
    process.off("SIGINT", handleInterrupt);
  }
}

void main();
