import path from "path";
import { DuplicateSlugError, NotFoundError, StoreError } from "../errors";
import {
  Artifact,
  ArtifactMetadata,
  ArtifactOutcome,
  ComplexityTier,
  ConsistencyReport,
  Feature,
  Phase,
  ValidationRecord,
  emptyIterations,
  emptyPhaseStatus
} from "../types";
import { createModuleLogger } from "../utils/logger";
import { normalizeSlug } from "../utils/slug";
import { validateJson } from "../validation/validate";
import {
  ensureDir,
  listDirectories,
  listFiles,
  readJsonIfExists,
  readTextIfExists,
  writeFileAtomic,
  writeJsonAtomic
} from "../workspace/files";
import { LockOptions, withFileLock } from "../workspace/lock";

const log = createModuleLogger("store");

export const STORE_DIR_NAME = ".specloop";

/** A feature record, its storage key (`feature-007-add-auth`), its number, or an active feature's slug. */
export type FeatureRef = Feature | string | number;

export type CreateFeatureInput = {
  slug: string;
  tier: ComplexityTier;
  request?: string;
};

export type PutArtifactOptions = {
  iteration?: number;
  outcome?: ArtifactOutcome;
};

export type ListFeaturesOptions = {
  includeArchived?: boolean;
};

export type ArtifactStore = {
  readonly root: string;
  nextFeatureNumber(): Promise<number>;
  createFeature(input: CreateFeatureInput): Promise<Feature>;
  getFeature(ref: FeatureRef): Promise<Feature>;
  listFeatures(options?: ListFeaturesOptions): AsyncIterable<Feature>;
  updateFeature(ref: FeatureRef, change: (current: Feature) => Feature): Promise<Feature>;
  archiveFeature(ref: FeatureRef): Promise<Feature>;
  putArtifact(ref: FeatureRef, phase: Phase, content: string, options?: PutArtifactOptions): Promise<Artifact>;
  getLatest(ref: FeatureRef, phase: Phase): Promise<Artifact>;
  findLatest(ref: FeatureRef, phase: Phase): Promise<Artifact | null>;
  getHistory(ref: FeatureRef, phase: Phase): Promise<Artifact[]>;
  appendValidation(ref: FeatureRef, record: ValidationRecord): Promise<ValidationRecord[]>;
  getValidationHistory(ref: FeatureRef, phase: Phase): Promise<ValidationRecord[]>;
  saveConsistencyReport(ref: FeatureRef, report: ConsistencyReport): Promise<string>;
};

type IndexEntry = {
  number: number;
  slug: string;
  key: string;
  archived: boolean;
};

type FeatureIndex = {
  version: 1;
  lastNumber: number;
  features: IndexEntry[];
};

type StoredMetadata = ArtifactMetadata & {
  phase: Phase;
  version: number;
};

const VERSION_FILE = /^v(\d+)\.json$/;

export function featureKey(number: number, slug: string): string {
  return `feature-${String(number).padStart(3, "0")}-${slug}`;
}

function versionName(version: number): string {
  return `v${String(version).padStart(4, "0")}`;
}

function assertStored(schemaFile: string, value: unknown, file: string): void {
  const validation = validateJson(schemaFile, value);
  if (!validation.valid) {
    throw new StoreError(`Invalid stored data in ${file}: ${validation.errors.join("; ")}`);
  }
}

function assertFeature(value: unknown, file: string): asserts value is Feature {
  assertStored("feature.schema.json", value, file);
}

function assertFeatureIndex(value: unknown, file: string): asserts value is FeatureIndex {
  assertStored("feature-index.schema.json", value, file);
}

function assertStoredMetadata(value: unknown, file: string): asserts value is StoredMetadata {
  assertStored("artifact-metadata.schema.json", value, file);
}

function assertValidationLog(value: unknown, file: string): asserts value is ValidationRecord[] {
  assertStored("validation-history.schema.json", value, file);
}

function toEntry(feature: Feature): IndexEntry {
  return { number: feature.number, slug: feature.slug, key: feature.key, archived: feature.archived };
}

export class FsArtifactStore implements ArtifactStore {
  readonly root: string;
  private readonly specsDir: string;
  private readonly indexPath: string;
  private readonly lockOptions: LockOptions;
  private readonly now: () => Date;

  constructor(workspaceRoot: string, options: { lock?: LockOptions; now?: () => Date } = {}) {
    this.root = path.join(path.resolve(workspaceRoot), STORE_DIR_NAME);
    this.specsDir = path.join(this.root, "specs");
    this.indexPath = path.join(this.root, "index.json");
    this.lockOptions = options.lock ?? {};
    this.now = options.now ?? (() => new Date());
  }

  async nextFeatureNumber(): Promise<number> {
    const index = await this.readIndex();
    return this.highWaterMark(index) + 1;
  }

  async createFeature(input: CreateFeatureInput): Promise<Feature> {
    const slug = normalizeSlug(input.slug);
    const feature = await this.withIndexLock(async () => {
      const index = await this.readIndex();
      const clash = index.features.find((entry) => !entry.archived && entry.slug === slug);
      if (clash) {
        throw new DuplicateSlugError(slug, clash.key);
      }
      const number = this.highWaterMark(index) + 1;
      const timestamp = this.now().toISOString();
      const created: Feature = {
        number,
        slug,
        key: featureKey(number, slug),
        tier: input.tier,
        request: input.request ?? "",
        phaseStatus: emptyPhaseStatus(),
        iterations: emptyIterations(),
        archived: false,
        createdAt: timestamp,
        updatedAt: timestamp
      };
      await writeJsonAtomic(this.featureFile(created.key), created);
      await this.writeIndex({
        version: 1,
        lastNumber: number,
        features: [...index.features, toEntry(created)]
      });
      return created;
    });
    log.info({ feature: feature.key, tier: feature.tier }, "feature created");
    return feature;
  }

  async getFeature(ref: FeatureRef): Promise<Feature> {
    const key = await this.resolveKey(ref);
    const file = this.featureFile(key);
    const stored = await readJsonIfExists(file);
    if (stored === null) {
      throw new NotFoundError(`Feature ${key} has no record in ${this.specsDir}.`);
    }
    assertFeature(stored, file);
    return stored;
  }

  listFeatures(options: ListFeaturesOptions = {}): AsyncIterable<Feature> {
    // Each iteration re-reads the index, so the sequence can be walked again.
    return {
      [Symbol.asyncIterator]: () => this.iterateFeatures(options.includeArchived ?? false)
    };
  }

  async updateFeature(ref: FeatureRef, change: (current: Feature) => Feature): Promise<Feature> {
    const key = await this.resolveKey(ref);
    return this.withFeatureLock(key, async () => {
      const current = await this.getFeature(key);
      const next: Feature = {
        ...change(current),
        number: current.number,
        slug: current.slug,
        key: current.key,
        updatedAt: this.now().toISOString()
      };
      await writeJsonAtomic(this.featureFile(key), next);
      return next;
    });
  }

  async archiveFeature(ref: FeatureRef): Promise<Feature> {
    const key = await this.resolveKey(ref);
    const archived = await this.updateFeature(key, (current) => ({ ...current, archived: true }));
    await this.withIndexLock(async () => {
      const index = await this.readIndex();
      await this.writeIndex({
        ...index,
        features: index.features.map((entry) => (entry.key === key ? { ...entry, archived: true } : entry))
      });
    });
    log.info({ feature: key }, "feature archived");
    return archived;
  }

  async putArtifact(ref: FeatureRef, phase: Phase, content: string, options: PutArtifactOptions = {}): Promise<Artifact> {
    const key = await this.resolveKey(ref);
    const dir = this.artifactDir(key, phase);
    return this.withFeatureLock(key, async () => {
      const versions = await this.listVersions(dir);
      const version = (versions.length > 0 ? versions[versions.length - 1] : 0) + 1;
      const metadata: StoredMetadata = {
        phase,
        version,
        createdAt: this.now().toISOString(),
        iteration: options.iteration ?? 0,
        outcome: options.outcome ?? "unvalidated"
      };
      const name = versionName(version);
      await writeFileAtomic(path.join(dir, `${name}.md`), content);
      // The metadata file is what makes a version visible to readers.
      await writeJsonAtomic(path.join(dir, `${name}.json`), metadata);
      log.debug({ feature: key, phase, version, outcome: metadata.outcome }, "artifact stored");
      return {
        featureKey: key,
        phase,
        version,
        content,
        metadata: { createdAt: metadata.createdAt, iteration: metadata.iteration, outcome: metadata.outcome }
      };
    });
  }

  async getLatest(ref: FeatureRef, phase: Phase): Promise<Artifact> {
    const latest = await this.findLatest(ref, phase);
    if (!latest) {
      throw new NotFoundError(`No ${phase} artifact for ${await this.resolveKey(ref)}.`);
    }
    return latest;
  }

  async findLatest(ref: FeatureRef, phase: Phase): Promise<Artifact | null> {
    const key = await this.resolveKey(ref);
    const versions = await this.listVersions(this.artifactDir(key, phase));
    if (versions.length === 0) {
      return null;
    }
    return this.readVersion(key, phase, versions[versions.length - 1]);
  }

  async getHistory(ref: FeatureRef, phase: Phase): Promise<Artifact[]> {
    const key = await this.resolveKey(ref);
    const versions = await this.listVersions(this.artifactDir(key, phase));
    const history: Artifact[] = [];
    for (const version of versions) {
      history.push(await this.readVersion(key, phase, version));
    }
    return history;
  }

  async appendValidation(ref: FeatureRef, record: ValidationRecord): Promise<ValidationRecord[]> {
    const key = await this.resolveKey(ref);
    return this.withFeatureLock(key, async () => {
      const history = await this.getValidationHistory(key, record.phase);
      const next = [...history, record];
      await writeJsonAtomic(this.validationFile(key, record.phase), next);
      return next;
    });
  }

  async getValidationHistory(ref: FeatureRef, phase: Phase): Promise<ValidationRecord[]> {
    const key = await this.resolveKey(ref);
    const file = this.validationFile(key, phase);
    const stored = await readJsonIfExists(file);
    if (stored === null) {
      return [];
    }
    assertValidationLog(stored, file);
    return stored;
  }

  async saveConsistencyReport(ref: FeatureRef, report: ConsistencyReport): Promise<string> {
    const key = await this.resolveKey(ref);
    const file = path.join(this.specsDir, key, "analysis.json");
    await this.withFeatureLock(key, () => writeJsonAtomic(file, report));
    return file;
  }

  private async *iterateFeatures(includeArchived: boolean): AsyncGenerator<Feature> {
    const index = await this.readIndex();
    const entries = [...index.features].sort((a, b) => a.number - b.number);
    for (const entry of entries) {
      if (entry.archived && !includeArchived) {
        continue;
      }
      const file = this.featureFile(entry.key);
      const stored = await readJsonIfExists(file);
      if (stored === null) {
        log.debug({ feature: entry.key }, "indexed feature has no record, skipping");
        continue;
      }
      assertFeature(stored, file);
      yield stored;
    }
  }

  private highWaterMark(index: FeatureIndex): number {
    return index.features.reduce((max, entry) => Math.max(max, entry.number), index.lastNumber);
  }

  private async readIndex(): Promise<FeatureIndex> {
    const stored = await readJsonIfExists(this.indexPath);
    if (stored === null) {
      return this.rebuildIndex();
    }
    assertFeatureIndex(stored, this.indexPath);
    return stored;
  }

  // Without an index the specs directory is the source of truth.
  private async rebuildIndex(): Promise<FeatureIndex> {
    const features: IndexEntry[] = [];
    for (const dir of await listDirectories(this.specsDir)) {
      const file = this.featureFile(dir);
      const stored = await readJsonIfExists(file);
      if (stored !== null) {
        assertFeature(stored, file);
        features.push(toEntry(stored));
      }
    }
    features.sort((a, b) => a.number - b.number);
    const lastNumber = features.reduce((max, entry) => Math.max(max, entry.number), 0);
    return { version: 1, lastNumber, features };
  }

  private async writeIndex(index: FeatureIndex): Promise<void> {
    await writeJsonAtomic(this.indexPath, index);
  }

  private async resolveKey(ref: FeatureRef): Promise<string> {
    if (typeof ref === "object") {
      return ref.key;
    }
    const index = await this.readIndex();
    const text = String(ref).trim();
    const byKey = index.features.find((entry) => entry.key === text);
    if (byKey) {
      return byKey.key;
    }
    if (/^\d+$/.test(text)) {
      const byNumber = index.features.find((entry) => entry.number === Number(text));
      if (byNumber) {
        return byNumber.key;
      }
    }
    const bySlug = index.features.find((entry) => !entry.archived && entry.slug === text);
    if (bySlug) {
      return bySlug.key;
    }
    throw new NotFoundError(`Feature not found: ${text}`);
  }

  private async listVersions(dir: string): Promise<number[]> {
    const versions: number[] = [];
    for (const file of await listFiles(dir)) {
      const match = VERSION_FILE.exec(file);
      if (match) {
        versions.push(Number(match[1]));
      }
    }
    return versions.sort((a, b) => a - b);
  }

  private async readVersion(key: string, phase: Phase, version: number): Promise<Artifact> {
    const dir = this.artifactDir(key, phase);
    const name = versionName(version);
    const metaFile = path.join(dir, `${name}.json`);
    const metadata = await readJsonIfExists(metaFile);
    const content = await readTextIfExists(path.join(dir, `${name}.md`));
    if (metadata === null || content === null) {
      throw new StoreError(`Version ${version} of ${phase} for ${key} is incomplete.`);
    }
    assertStoredMetadata(metadata, metaFile);
    return {
      featureKey: key,
      phase,
      version,
      content,
      metadata: { createdAt: metadata.createdAt, iteration: metadata.iteration, outcome: metadata.outcome }
    };
  }

  private async withIndexLock<T>(fn: () => Promise<T>): Promise<T> {
    await ensureDir(this.root);
    return withFileLock(`${this.indexPath}.lock`, fn, this.lockOptions);
  }

  private async withFeatureLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const dir = path.join(this.specsDir, key);
    await ensureDir(dir);
    return withFileLock(path.join(dir, ".lock"), fn, this.lockOptions);
  }

  private featureFile(key: string): string {
    return path.join(this.specsDir, key, "feature.json");
  }

  private artifactDir(key: string, phase: Phase): string {
    return path.join(this.specsDir, key, "artifacts", phase);
  }

  private validationFile(key: string, phase: Phase): string {
    return path.join(this.specsDir, key, "validation", `${phase}.json`);
  }
}

export function createArtifactStore(workspaceRoot: string, options?: { lock?: LockOptions; now?: () => Date }): ArtifactStore {
  return new FsArtifactStore(workspaceRoot, options);
}
