import fs from "fs";
import path from "path";
import { configPath } from "../config";
import { PHASES } from "../types";
import { schemasDir, templatesDir } from "../paths";
import { validateTemplates } from "../templates/validate";
import { openContext, reportError } from "./context";

const REQUIRED_SCHEMAS = [
  "artifact-metadata.schema.json",
  "feature-index.schema.json",
  "feature.schema.json",
  "generation-status.schema.json",
  "generation-submit.schema.json",
  "template-index.schema.json",
  "validation-history.schema.json",
  "workflow-config.schema.json"
];

function printCheck(ok: boolean, label: string, detail?: string): void {
  console.log(`${ok ? "OK" : "FAIL"} ${label}${detail ? `: ${detail}` : ""}`);
}

export async function runDoctor(): Promise<void> {
  const context = openContext();
  if (!context) {
    printCheck(false, "configuration", "see error above");
    return;
  }
  let failures = 0;
  printCheck(true, "configuration", configPath(context.workspace));
  const missingSchemas = REQUIRED_SCHEMAS.filter((file) => !fs.existsSync(path.join(schemasDir(), file)));
  printCheck(missingSchemas.length === 0, "schemas", missingSchemas.length === 0 ? schemasDir() : `missing ${missingSchemas.join(", ")}`);
  if (missingSchemas.length > 0) {
    failures += 1;
  }

  const templates = validateTemplates(templatesDir(), [...PHASES, "revision"]);
  printCheck(templates.valid, "templates", templates.valid ? templatesDir() : undefined);
  templates.errors.forEach((error) => console.log(`  - ${error}`));
  if (!templates.valid) {
    failures += 1;
  }

  const apiKey = process.env[context.config.client.apiKeyEnv]?.trim();
  printCheck(Boolean(apiKey), "api key", apiKey ? context.config.client.apiKeyEnv : `${context.config.client.apiKeyEnv} is not set`);
  if (!apiKey) {
    failures += 1;
  }

  try {
    let count = 0;
    for await (const _feature of context.store.listFeatures({ includeArchived: true })) {
      count += 1;
    }
    printCheck(true, "store", `${count} feature(s) in ${context.store.root}`);
  } catch (error) {
    failures += 1;
    printCheck(false, "store");
    reportError(error);
  }

  if (failures > 0) {
    process.exitCode = 1;
  }
}
