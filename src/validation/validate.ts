import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { AnySchema } from "ajv";
import { schemasDir } from "../paths";

export type SchemaValidation = { valid: boolean; errors: string[] };

let cached: Ajv2020 | null = null;

function loadSchemas(dir: string): Map<string, AnySchema & { $id?: string }> {
  const schemaFiles = fs.readdirSync(dir).filter((file) => file.endsWith(".schema.json"));
  const schemas = new Map<string, AnySchema & { $id?: string }>();
  for (const file of schemaFiles) {
    const schema = JSON.parse(fs.readFileSync(path.join(dir, file), "utf-8")) as { $id?: string };
    if (!schema.$id) {
      schema.$id = file;
    }
    schemas.set(file, schema);
  }
  return schemas;
}

function getAjv(): Ajv2020 {
  if (cached) {
    return cached;
  }
  const ajv = new Ajv2020({ allErrors: true, allowUnionTypes: true });
  for (const schema of loadSchemas(schemasDir()).values()) {
    ajv.addSchema(schema, schema.$id);
  }
  cached = ajv;
  return ajv;
}

export function validateJson(schemaFile: string, data: unknown): SchemaValidation {
  const validate = getAjv().getSchema(schemaFile);
  if (!validate) {
    return { valid: false, errors: [`Schema not found: ${schemaFile}`] };
  }
  const valid = validate(data);
  const errors = (validate.errors ?? []).map((error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`.trim());
  return { valid: Boolean(valid), errors };
}
