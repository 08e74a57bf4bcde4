import fs from "fs";
import path from "path";
import { templatesDir } from "../paths";
import { validateJson } from "../validation/validate";

type TemplateIndex = {
  templates: Array<{ name: string; placeholders: string[] }>;
};

export type TemplateCheck = { valid: boolean; errors: string[] };

const PLACEHOLDER = /{{\s*([a-zA-Z0-9_]+)\s*}}/g;

export function extractPlaceholders(template: string): string[] {
  const found: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (!found.includes(match[1])) {
      found.push(match[1]);
    }
  }
  return found;
}

function sameSet(a: string[], b: string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((value) => right.has(value));
}

function readIndex(indexPath: string): TemplateIndex | string {
  if (!fs.existsSync(indexPath)) {
    return `Missing ${indexPath}`;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(indexPath, "utf-8"));
  } catch {
    return `Unreadable template index: ${indexPath}`;
  }
  if (!isTemplateIndex(parsed)) {
    return `Invalid template index: ${indexPath}`;
  }
  return parsed;
}

function isTemplateIndex(value: unknown): value is TemplateIndex {
  return validateJson("template-index.schema.json", value).valid;
}

/**
 * Checks the prompt templates against template-index.json: every required
 * template exists, and each file uses exactly the placeholders it declares.
 */
export function validateTemplates(dir = templatesDir(), required: readonly string[] = []): TemplateCheck {
  const index = readIndex(path.join(dir, "template-index.json"));
  if (typeof index === "string") {
    return { valid: false, errors: [index] };
  }

  const files = new Map<string, string>();
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.isFile() && entry.name.endsWith(".md")) {
      files.set(path.basename(entry.name, ".md"), path.join(dir, entry.name));
    }
  }

  const errors = required.filter((name) => !files.has(name)).map((name) => `Missing template: ${name}.md`);
  const declared = new Map(index.templates.map((entry) => [entry.name, entry.placeholders]));
  for (const name of declared.keys()) {
    if (!files.has(name)) {
      errors.push(`Template index entry missing file: ${name}`);
    }
  }

  for (const [name, file] of files) {
    const used = extractPlaceholders(fs.readFileSync(file, "utf-8")).sort();
    const expected = declared.get(name);
    if (expected === undefined) {
      if (used.length > 0) {
        errors.push(`Template file missing index entry: ${name}`);
      }
      continue;
    }
    if (!sameSet(used, expected)) {
      errors.push(`Template placeholder mismatch: ${name} (index=${[...expected].sort().join(", ")} file=${used.join(", ")})`);
    }
  }

  return { valid: errors.length === 0, errors };
}
