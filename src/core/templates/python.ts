import { normalizeContent, toSnakeCase } from "../text.js";
import type { FeatureDefinition, FileArtifact, GeneratorContext } from "../types.js";
import { buildPythonGitignore, buildReadme, compactArtifacts, hasFeature } from "./shared.js";

export const PYTHON_FEATURES: readonly FeatureDefinition[] = [
  { id: "black", label: "Black", description: "Code formatting configured in pyproject.toml", defaultEnabled: true },
  { id: "flake8", label: "Flake8", description: "Linting with a Black-compatible line length", defaultEnabled: true },
  { id: "pytest", label: "pytest", description: "Test suite with a starter test", defaultEnabled: true },
  { id: "pre-commit", label: "pre-commit", description: "Git hooks for the selected tools", defaultEnabled: false },
  { id: "docker", label: "Docker", description: "Slim Python Dockerfile", defaultEnabled: false }
];

const LINE_LENGTH = 88;

function buildRequirements(context: GeneratorContext): string {
  const lines = [
    "# Runtime dependencies",
    "python-dotenv>=1.0.0",
    ...(hasFeature(context, "black") || hasFeature(context, "flake8") || hasFeature(context, "pytest")
      ? ["", "# Development tools"]
      : []),
    ...(hasFeature(context, "black") ? ["black>=24.0.0"] : []),
    ...(hasFeature(context, "flake8") ? ["flake8>=7.0.0"] : []),
    ...(hasFeature(context, "pytest") ? ["pytest>=8.0.0"] : [])
  ];
  return normalizeContent(lines.join("\n"));
}

function buildMainModule(context: GeneratorContext): string {
  return normalizeContent(`def greet(name: str = "${context.projectName}") -> str:
    return f"Hello from {name}!"


def main() -> None:
    print(greet())


if __name__ == "__main__":
    main()
`);
}

function buildMainTest(context: GeneratorContext): string {
  return normalizeContent(`from src.main import greet


def test_greet_uses_project_name() -> None:
    assert greet() == "Hello from ${context.projectName}!"


def test_greet_accepts_custom_name() -> None:
    assert greet("world") == "Hello from world!"
`);
}

function buildPyproject(context: GeneratorContext): string {
  return normalizeContent(`[project]
name = "${toSnakeCase(context.projectName) || "python_app"}"
version = "0.1.0"
requires-python = ">=3.11"

[tool.black]
line-length = ${LINE_LENGTH}
target-version = ["py311"]
`);
}

function buildFlake8Config(): string {
  return normalizeContent(`[flake8]
max-line-length = ${LINE_LENGTH}
extend-ignore = E203
exclude = .git,__pycache__,.venv,venv,build,dist
`);
}

function buildPytestConfig(): string {
  return normalizeContent(`[pytest]
testpaths = tests
pythonpath = .
addopts = -ra
`);
}

function buildPreCommitConfig(context: GeneratorContext): string {
  const repos = [
    `  - repo: https://github.com/pre-commit/pre-commit-hooks
    rev: v4.6.0
    hooks:
      - id: trailing-whitespace
      - id: end-of-file-fixer
      - id: check-yaml`,
    ...(hasFeature(context, "black")
      ? [
          `  - repo: https://github.com/psf/black
    rev: 24.4.2
    hooks:
      - id: black`
        ]
      : []),
    ...(hasFeature(context, "flake8")
      ? [
          `  - repo: https://github.com/pycqa/flake8
    rev: 7.0.0
    hooks:
      - id: flake8`
        ]
      : [])
  ];
  return normalizeContent(`repos:\n${repos.join("\n")}`);
}

function buildDockerfile(): string {
  return normalizeContent(`FROM python:3.11-slim

WORKDIR /app

COPY requirements.txt ./
RUN pip install --no-cache-dir -r requirements.txt

COPY . .

CMD ["python", "-m", "src.main"]
`);
}

function buildPythonReadme(context: GeneratorContext): string {
  const tooling = [
    ...(hasFeature(context, "pytest") ? ["- `pytest`: run the tests"] : []),
    ...(hasFeature(context, "black") ? ["- `black .`: format"] : []),
    ...(hasFeature(context, "flake8") ? ["- `flake8`: lint"] : []),
    ...(hasFeature(context, "pre-commit") ? ["- `pre-commit install`: enable git hooks"] : [])
  ];
  const sections = [
    {
      title: "Getting Started",
      body: "```bash\npython -m venv .venv\nsource .venv/bin/activate\npip install -r requirements.txt\npython -m src.main\n```"
    },
    ...(tooling.length > 0 ? [{ title: "Tooling", body: tooling.join("\n") }] : [])
  ];
  return buildReadme(context.projectName, "Python project.", sections);
}

export function generatePythonProject(context: GeneratorContext): FileArtifact[] {
  const pytest = hasFeature(context, "pytest");

  return compactArtifacts([
    { path: "README.md", content: buildPythonReadme(context) },
    { path: ".gitignore", content: buildPythonGitignore() },
    { path: "requirements.txt", content: buildRequirements(context) },
    { path: "src/__init__.py", content: "" },
    { path: "src/main.py", content: buildMainModule(context) },
    { path: "tests/__init__.py", content: "" },
    hasFeature(context, "black") ? { path: "pyproject.toml", content: buildPyproject(context) } : null,
    hasFeature(context, "flake8") ? { path: ".flake8", content: buildFlake8Config() } : null,
    pytest ? { path: "tests/test_main.py", content: buildMainTest(context) } : null,
    pytest ? { path: "pytest.ini", content: buildPytestConfig() } : null,
    hasFeature(context, "pre-commit") ? { path: ".pre-commit-config.yaml", content: buildPreCommitConfig(context) } : null,
    hasFeature(context, "docker") ? { path: "Dockerfile", content: buildDockerfile() } : null
  ]);
}
