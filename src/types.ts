export type Phase = "constitution" | "specification" | "clarification" | "plan" | "tasks" | "implementation";

export const PHASES: readonly Phase[] = [
  "constitution",
  "specification",
  "clarification",
  "plan",
  "tasks",
  "implementation"
];

export type PhaseStatus = "PENDING" | "IN_PROGRESS" | "PASSED" | "BLOCKED" | "SKIPPED";

export type ComplexityTier = "simple" | "moderate" | "complex";

export type EffortLevel = "low" | "medium" | "high";

export type Feature = {
  number: number;
  slug: string;
  key: string;
  tier: ComplexityTier;
  request: string;
  phaseStatus: Record<Phase, PhaseStatus>;
  iterations: Record<Phase, number>;
  archived: boolean;
  createdAt: string;
  updatedAt: string;
};

export type ArtifactOutcome = "passed" | "failed" | "unvalidated";

export type ArtifactMetadata = {
  createdAt: string;
  iteration: number;
  outcome: ArtifactOutcome;
};

export type Artifact = {
  featureKey: string;
  phase: Phase;
  version: number;
  content: string;
  metadata: ArtifactMetadata;
};

export type Violation = {
  ruleId: string;
  message: string;
};

export type ValidationReport = {
  phase: Phase;
  iteration: number;
  passed: boolean;
  violations: Violation[];
};

export type ValidationRecord = ValidationReport & {
  artifactVersion: number | null;
  recordedAt: string;
};

export type ConsistencyHop = "requirements" | "components" | "success-criteria";

export type ConsistencyGap = {
  sourceArtifact: Phase;
  targetArtifact: Phase;
  missingReference: string;
};

export type HopCoverage = {
  hop: ConsistencyHop;
  sourceArtifact: Phase;
  targetArtifact: Phase;
  covered: number;
  total: number;
  ratio: number;
};

export type ArtifactQuality = {
  phase: Phase;
  length: number;
  lines: number;
  sections: number;
  placeholders: number;
  /** 0 to 100, one decimal. */
  completeness: number;
  issues: string[];
};

export type ChecklistItem = {
  category: string;
  name: string;
  passed: boolean;
};

export type QualityChecklist = {
  items: ChecklistItem[];
  passed: number;
  total: number;
  passRate: number;
};

export type QualityReport = {
  artifacts: ArtifactQuality[];
  consistencyIssues: string[];
  checklist: QualityChecklist;
  qualityScore: number;
  recommendations: string[];
};

export type ConsistencyReport = {
  featureKey: string;
  gaps: ConsistencyGap[];
  coverage: HopCoverage[];
  missingArtifacts: Phase[];
  quality: QualityReport;
};

export function isPhase(value: string): value is Phase {
  return (PHASES as readonly string[]).includes(value);
}

export function emptyPhaseStatus(): Record<Phase, PhaseStatus> {
  return {
    constitution: "PENDING",
    specification: "PENDING",
    clarification: "PENDING",
    plan: "PENDING",
    tasks: "PENDING",
    implementation: "PENDING"
  };
}

export function emptyIterations(): Record<Phase, number> {
  return {
    constitution: 0,
    specification: 0,
    clarification: 0,
    plan: 0,
    tasks: 0,
    implementation: 0
  };
}
