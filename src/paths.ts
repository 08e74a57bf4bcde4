import path from "path";

export function getRepoRoot(): string {
  const override = process.env.SPECLOOP_HOME?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.resolve(__dirname, "..");
}

export function schemasDir(): string {
  return path.join(getRepoRoot(), "schemas");
}

export function templatesDir(): string {
  return path.join(getRepoRoot(), "templates");
}
