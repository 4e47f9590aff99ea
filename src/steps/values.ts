/**
 * Value Helpers
 * Template rendering and small value utilities used by steps
 */

// Matches {{name}} or {{name.path.to.value}}
const PLACEHOLDER = /\{\{\s*(\w+(?:\.\w+)*)\s*\}\}/g;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Root names referenced by a template, in order of first use
 */
export function templateVariables(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    const root = match[1].split(".")[0];
    if (!names.includes(root)) names.push(root);
  }
  return names;
}

/**
 * Read a dotted path (`a.b.c`) out of a value
 */
export function getPath(value: unknown, path: string): unknown {
  let current = value;
  for (const part of path.split(".")) {
    if (part === "") continue;
    if (Array.isArray(current) && /^\d+$/.test(part)) {
      current = current[Number(part)];
    } else if (isRecord(current)) {
      current = current[part];
    } else {
      return undefined;
    }
  }
  return current;
}

/** Text form of a value for messages and templates */
export function stringify(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  return JSON.stringify(value);
}

/**
 * Replace {{placeholders}} with values; unknown paths render empty
 */
export function renderTemplate(
  template: string,
  values: Record<string, unknown>,
): string {
  return template.replace(PLACEHOLDER, (_, path: string) =>
    stringify(getPath(values, path)),
  );
}
