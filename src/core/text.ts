const PROJECT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const MAX_PROJECT_NAME_LENGTH = 214;

export function toKebabCase(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
}

export function toSnakeCase(value: string): string {
  return toKebabCase(value).replaceAll("-", "_");
}

export function toTitleCase(value: string): string {
  return value
    .split(/[-_.\s]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

/** Returns an error message for an unusable project name, or undefined when it is valid. */
export function validateProjectName(value: string | undefined): string | undefined {
  const name = value?.trim() ?? "";
  if (!name) return "Project name is required.";
  if (name.length > MAX_PROJECT_NAME_LENGTH) return `Project name must be at most ${MAX_PROJECT_NAME_LENGTH} characters.`;
  if (!PROJECT_NAME_PATTERN.test(name)) {
    return "Use letters, digits, '.', '_' or '-' and start with a letter or digit.";
  }
  return undefined;
}

export function formatJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export function normalizeContent(content: string): string {
  return content.replace(/\r\n/g, "\n").trimEnd() + "\n";
}
