import fs from "fs";
import path from "path";
import { DuplicateSlugError, NotFoundError, StoreError } from "../errors";
import { analyzeArtifacts } from "../analysis/consistency";
import { PASSING, makeTempWorkspace, removeTempWorkspace } from "../test-support/artifacts";
import { ConsistencyReport, Feature, ValidationRecord } from "../types";
import { ArtifactStore, createArtifactStore, featureKey } from "./artifact-store";

const FIXED_NOW = new Date("2026-03-01T10:00:00.000Z");

async function collect(features: AsyncIterable<Feature>): Promise<string[]> {
  const keys: string[] = [];
  for await (const feature of features) {
    keys.push(feature.key);
  }
  return keys;
}

describe("FsArtifactStore", () => {
  let workspace: string;
  let store: ArtifactStore;

  beforeEach(() => {
    workspace = makeTempWorkspace("store");
    store = createArtifactStore(workspace, { now: () => FIXED_NOW });
  });

  afterEach(() => {
    removeTempWorkspace(workspace);
  });

  describe("feature numbering", () => {
    it("formats keys with a zero-padded number", () => {
      expect(featureKey(7, "add-auth")).toBe("feature-007-add-auth");
      expect(featureKey(1234, "x")).toBe("feature-1234-x");
    });

    it("creates a feature with every phase pending", async () => {
      const feature = await store.createFeature({ slug: "Add Auth", tier: "moderate", request: "add auth" });
      expect(feature).toEqual({
        number: 1,
        slug: "add-auth",
        key: "feature-001-add-auth",
        tier: "moderate",
        request: "add auth",
        phaseStatus: {
          constitution: "PENDING",
          specification: "PENDING",
          clarification: "PENDING",
          plan: "PENDING",
          tasks: "PENDING",
          implementation: "PENDING"
        },
        iterations: { constitution: 0, specification: 0, clarification: 0, plan: 0, tasks: 0, implementation: 0 },
        archived: false,
        createdAt: "2026-03-01T10:00:00.000Z",
        updatedAt: "2026-03-01T10:00:00.000Z"
      });
      expect(fs.existsSync(path.join(workspace, ".specloop", "specs", "feature-001-add-auth", "feature.json"))).toBe(true);
    });

    it("hands out distinct numbers to concurrent creations", async () => {
      const created = await Promise.all(
        Array.from({ length: 8 }, (_, i) => store.createFeature({ slug: `feature-${i}`, tier: "simple" }))
      );
      expect(new Set(created.map((feature) => feature.number))).toEqual(new Set([1, 2, 3, 4, 5, 6, 7, 8]));
    });

    it("continues from the current maximum", async () => {
      await store.createFeature({ slug: "first", tier: "simple" });
      await store.createFeature({ slug: "second", tier: "simple" });
      const other = createArtifactStore(workspace);
      const created = await Promise.all(
        Array.from({ length: 5 }, (_, i) => (i % 2 === 0 ? store : other).createFeature({ slug: `batch-${i}`, tier: "simple" }))
      );
      expect(new Set(created.map((feature) => feature.number))).toEqual(new Set([3, 4, 5, 6, 7]));
      await expect(store.nextFeatureNumber()).resolves.toBe(8);
    });

    it("never reuses a number after archiving", async () => {
      await store.createFeature({ slug: "one", tier: "simple" });
      const two = await store.createFeature({ slug: "two", tier: "simple" });
      await store.archiveFeature(two);
      const three = await store.createFeature({ slug: "three", tier: "simple" });
      expect(three.number).toBe(3);
    });

    it("never reuses a number after a feature directory is removed", async () => {
      await store.createFeature({ slug: "one", tier: "simple" });
      const two = await store.createFeature({ slug: "two", tier: "simple" });
      fs.rmSync(path.join(workspace, ".specloop", "specs", two.key), { recursive: true, force: true });

      const next = await store.createFeature({ slug: "again", tier: "simple" });
      expect(next.key).toBe("feature-003-again");
      await expect(collect(store.listFeatures())).resolves.toEqual(["feature-001-one", "feature-003-again"]);
    });

    it("rebuilds the index from feature records when it is missing", async () => {
      await store.createFeature({ slug: "one", tier: "simple" });
      await store.createFeature({ slug: "two", tier: "simple" });
      fs.rmSync(path.join(workspace, ".specloop", "index.json"));

      await expect(store.nextFeatureNumber()).resolves.toBe(3);
      await expect(store.getFeature("two")).resolves.toMatchObject({ number: 2 });
    });
  });

  describe("slugs", () => {
    it("rejects a slug already used by an active feature", async () => {
      await store.createFeature({ slug: "add-auth", tier: "simple" });
      await expect(store.createFeature({ slug: "add-auth", tier: "complex" })).rejects.toBeInstanceOf(DuplicateSlugError);
    });

    it("frees the slug once the feature is archived", async () => {
      const first = await store.createFeature({ slug: "add-auth", tier: "simple" });
      await store.archiveFeature(first);
      const second = await store.createFeature({ slug: "add-auth", tier: "simple" });

      expect(second.key).toBe("feature-002-add-auth");
      await expect(store.getFeature("add-auth")).resolves.toMatchObject({ key: "feature-002-add-auth" });
      await expect(store.getFeature(1)).resolves.toMatchObject({ key: "feature-001-add-auth", archived: true });
    });
  });

  describe("lookups", () => {
    it("resolves a feature by key, number, numeric string or slug", async () => {
      await store.createFeature({ slug: "alpha", tier: "simple" });
      const beta = await store.createFeature({ slug: "beta", tier: "simple" });

      for (const ref of ["feature-002-beta", 2, "2", "beta", beta]) {
        await expect(store.getFeature(ref)).resolves.toMatchObject({ key: "feature-002-beta" });
      }
    });

    it("reports unknown features", async () => {
      await expect(store.getFeature("missing")).rejects.toBeInstanceOf(NotFoundError);
      await expect(store.getFeature(42)).rejects.toThrow("Feature not found: 42");
    });

    it("rejects corrupt records", async () => {
      const feature = await store.createFeature({ slug: "alpha", tier: "simple" });
      fs.writeFileSync(path.join(workspace, ".specloop", "specs", feature.key, "feature.json"), "{");
      await expect(store.getFeature(feature.key)).rejects.toBeInstanceOf(StoreError);
    });

    it("rejects records that do not match the schema", async () => {
      const feature = await store.createFeature({ slug: "alpha", tier: "simple" });
      fs.writeFileSync(path.join(workspace, ".specloop", "specs", feature.key, "feature.json"), JSON.stringify({ number: 1 }));
      await expect(store.getFeature(feature.key)).rejects.toThrow(/Invalid stored data/);
    });
  });

  describe("listFeatures", () => {
    it("yields active features in ascending number order and can be walked again", async () => {
      await store.createFeature({ slug: "alpha", tier: "simple" });
      const beta = await store.createFeature({ slug: "beta", tier: "simple" });
      await store.createFeature({ slug: "gamma", tier: "simple" });
      await store.archiveFeature(beta);

      const features = store.listFeatures();
      await expect(collect(features)).resolves.toEqual(["feature-001-alpha", "feature-003-gamma"]);
      await expect(collect(features)).resolves.toEqual(["feature-001-alpha", "feature-003-gamma"]);
      await expect(collect(store.listFeatures({ includeArchived: true }))).resolves.toEqual([
        "feature-001-alpha",
        "feature-002-beta",
        "feature-003-gamma"
      ]);
    });

    it("yields nothing for an empty workspace", async () => {
      await expect(collect(store.listFeatures())).resolves.toEqual([]);
    });
  });

  describe("updateFeature", () => {
    it("keeps identity fields and stamps the update time", async () => {
      const feature = await store.createFeature({ slug: "alpha", tier: "simple" });
      const later = createArtifactStore(workspace, { now: () => new Date("2026-03-02T00:00:00.000Z") });
      const updated = await later.updateFeature(feature, (current) => ({
        ...current,
        number: 99,
        slug: "renamed",
        phaseStatus: { ...current.phaseStatus, constitution: "PASSED" }
      }));

      expect(updated).toMatchObject({
        number: 1,
        slug: "alpha",
        key: "feature-001-alpha",
        createdAt: "2026-03-01T10:00:00.000Z",
        updatedAt: "2026-03-02T00:00:00.000Z"
      });
      expect(updated.phaseStatus.constitution).toBe("PASSED");
      await expect(store.getFeature(1)).resolves.toEqual(updated);
    });
  });

  describe("artifacts", () => {
    it("appends versions and never overwrites earlier ones", async () => {
      const feature = await store.createFeature({ slug: "alpha", tier: "simple" });
      const first = await store.putArtifact(feature, "specification", "draft one", { iteration: 1, outcome: "failed" });
      const second = await store.putArtifact(feature, "specification", "draft two", { iteration: 2, outcome: "passed" });

      expect(first.version).toBe(1);
      expect(second).toEqual({
        featureKey: "feature-001-alpha",
        phase: "specification",
        version: 2,
        content: "draft two",
        metadata: { createdAt: "2026-03-01T10:00:00.000Z", iteration: 2, outcome: "passed" }
      });
      await expect(store.getLatest(feature, "specification")).resolves.toEqual(second);
      const history = await store.getHistory(feature, "specification");
      expect(history.map((artifact) => artifact.content)).toEqual(["draft one", "draft two"]);
      expect(history[0].metadata.outcome).toBe("failed");

      const dir = path.join(workspace, ".specloop", "specs", feature.key, "artifacts", "specification");
      expect(fs.readFileSync(path.join(dir, "v0001.md"), "utf-8")).toBe("draft one");
    });

    it("defaults metadata to an unvalidated artifact", async () => {
      const feature = await store.createFeature({ slug: "alpha", tier: "simple" });
      const artifact = await store.putArtifact(feature, "plan", "plan");
      expect(artifact.metadata).toEqual({ createdAt: "2026-03-01T10:00:00.000Z", iteration: 0, outcome: "unvalidated" });
    });

    it("assigns distinct versions to concurrent writes", async () => {
      const feature = await store.createFeature({ slug: "alpha", tier: "simple" });
      const written = await Promise.all(
        ["a", "b", "c", "d"].map((content) => store.putArtifact(feature, "tasks", content))
      );
      expect(written.map((artifact) => artifact.version).sort()).toEqual([1, 2, 3, 4]);
    });

    it("distinguishes a missing artifact from a missing feature", async () => {
      const feature = await store.createFeature({ slug: "alpha", tier: "simple" });
      await expect(store.findLatest(feature, "plan")).resolves.toBeNull();
      await expect(store.getHistory(feature, "plan")).resolves.toEqual([]);
      await expect(store.getLatest(feature, "plan")).rejects.toThrow("No plan artifact for feature-001-alpha.");
      await expect(store.putArtifact("nobody", "plan", "x")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("validation history", () => {
    const record = (iteration: number, passed: boolean): ValidationRecord => ({
      phase: "specification",
      iteration,
      passed,
      violations: passed ? [] : [{ ruleId: "specification.success-criteria", message: "Missing required section: Success Criteria" }],
      artifactVersion: iteration,
      recordedAt: "2026-03-01T10:00:00.000Z"
    });

    it("appends records in order", async () => {
      const feature = await store.createFeature({ slug: "alpha", tier: "simple" });
      await expect(store.getValidationHistory(feature, "specification")).resolves.toEqual([]);

      await store.appendValidation(feature, record(1, false));
      const all = await store.appendValidation(feature, record(2, true));

      expect(all).toEqual([record(1, false), record(2, true)]);
      await expect(store.getValidationHistory(feature, "specification")).resolves.toEqual(all);
      await expect(store.getValidationHistory(feature, "plan")).resolves.toEqual([]);
    });

    it("keeps records of calls that produced no artifact", async () => {
      const feature = await store.createFeature({ slug: "alpha", tier: "simple" });
      const unavailable: ValidationRecord = { ...record(1, false), artifactVersion: null };
      await expect(store.appendValidation(feature, unavailable)).resolves.toEqual([unavailable]);
    });
  });

  it("saves a consistency report beside the feature", async () => {
    const feature = await store.createFeature({ slug: "alpha", tier: "simple" });
    const report: ConsistencyReport = analyzeArtifacts(feature.key, { specification: PASSING.specification });

    const file = await store.saveConsistencyReport(feature, report);

    expect(file).toBe(path.join(workspace, ".specloop", "specs", "feature-001-alpha", "analysis.json"));
    expect(JSON.parse(fs.readFileSync(file, "utf-8"))).toEqual(report);
  });
});
