import fs from "fs";
import path from "path";
import { NotFoundError } from "../errors";
import { templatesDir } from "../paths";

const cache = new Map<string, string>();

export function loadTemplate(name: string): string {
  const cached = cache.get(name);
  if (cached !== undefined) {
    return cached;
  }
  const filePath = path.join(templatesDir(), `${name}.md`);
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(`Template not found: ${name}.md in ${templatesDir()}`);
  }
  const template = fs.readFileSync(filePath, "utf-8");
  cache.set(name, template);
  return template;
}

export function renderTemplate(template: string, data: Record<string, string>): string {
  let output = template;
  for (const [key, value] of Object.entries(data)) {
    const token = `{{${key}}}`;
    output = output.split(token).join(value);
  }
  return output;
}
