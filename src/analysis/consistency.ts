import { ArtifactStore, FeatureRef } from "../store/artifact-store";
import { ConsistencyGap, ConsistencyHop, ConsistencyReport, HopCoverage, PHASES, Phase } from "../types";
import { naturalCompare } from "../utils/text";
import { ReferenceKind, extractReferences } from "../validation/markers";
import { assessQuality } from "./quality";

type HopDefinition = {
  hop: ConsistencyHop;
  source: Phase;
  target: Phase;
  kind: ReferenceKind;
};

export const HOPS: readonly HopDefinition[] = [
  { hop: "requirements", source: "specification", target: "plan", kind: "requirement" },
  { hop: "components", source: "plan", target: "tasks", kind: "component" },
  { hop: "success-criteria", source: "specification", target: "plan", kind: "success-criterion" }
];

const ANALYZED_PHASES: readonly Phase[] = PHASES.filter((phase) =>
  HOPS.some((hop) => hop.source === phase || hop.target === phase)
);

/**
 * Cross-artifact traceability over the latest artifact contents. An item of the
 * source artifact counts as covered when its identifier appears in the target.
 * The quality section assesses every artifact given.
 */
export function analyzeArtifacts(featureKey: string, artifacts: Partial<Record<Phase, string>>): ConsistencyReport {
  const missingArtifacts = ANALYZED_PHASES.filter((phase) => artifacts[phase] === undefined);
  const gaps: ConsistencyGap[] = [];
  const coverage: HopCoverage[] = [];

  for (const definition of HOPS) {
    const sourceContent = artifacts[definition.source];
    const targetContent = artifacts[definition.target];
    if (sourceContent === undefined || targetContent === undefined) {
      continue;
    }
    const items = extractReferences(sourceContent, definition.kind);
    const referenced = new Set(extractReferences(targetContent, definition.kind));
    const missing = items.filter((item) => !referenced.has(item));
    for (const missingReference of missing) {
      gaps.push({ sourceArtifact: definition.source, targetArtifact: definition.target, missingReference });
    }
    const covered = items.length - missing.length;
    coverage.push({
      hop: definition.hop,
      sourceArtifact: definition.source,
      targetArtifact: definition.target,
      covered,
      total: items.length,
      ratio: items.length === 0 ? 1 : covered / items.length
    });
  }

  gaps.sort(
    (a, b) =>
      PHASES.indexOf(a.sourceArtifact) - PHASES.indexOf(b.sourceArtifact) ||
      PHASES.indexOf(a.targetArtifact) - PHASES.indexOf(b.targetArtifact) ||
      naturalCompare(a.missingReference, b.missingReference)
  );

  return { featureKey, gaps, coverage, missingArtifacts, quality: assessQuality(artifacts, gaps.length) };
}

export async function analyze(store: ArtifactStore, ref: FeatureRef): Promise<ConsistencyReport> {
  const feature = await store.getFeature(ref);
  const artifacts: Partial<Record<Phase, string>> = {};
  for (const phase of PHASES) {
    const latest = await store.findLatest(feature, phase);
    if (latest) {
      artifacts[phase] = latest.content;
    }
  }
  return analyzeArtifacts(feature.key, artifacts);
}
