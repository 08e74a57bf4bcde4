import { ArtifactQuality, ChecklistItem, PHASES, Phase, QualityChecklist, QualityReport } from "../types";
import { extractSections, placeholderMarkers } from "../validation/markers";

type Artifacts = Partial<Record<Phase, string>>;

type ChecklistDefinition = {
  category: string;
  name: string;
  check: (artifacts: Artifacts) => boolean;
};

const MIN_LENGTH = 500;
const MIN_SECTIONS = 3;
const MAX_ISSUES = 3;
const QUALITY_TARGET = 70;
const COMPLETENESS_TARGET = 80;
const FEATURE_LINE = /\*\*Feature\*\*:\s*(.+?)\s*$/;
const HOW_TERMS = ["implementation", "code", "function", "class", "method"];

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function mentions(phase: Phase, ...texts: string[]): (artifacts: Artifacts) => boolean {
  return (artifacts) => {
    const content = artifacts[phase];
    return content !== undefined && texts.some((text) => content.includes(text));
  };
}

export const CHECKLIST: readonly ChecklistDefinition[] = [
  { category: "Constitution", name: "Principles defined", check: (artifacts) => artifacts.constitution !== undefined },
  { category: "Constitution", name: "Version specified", check: mentions("constitution", "Version:", "**Version**:") },
  { category: "Constitution", name: "Governance rules clear", check: mentions("constitution", "Governance") },
  { category: "Specification", name: "Requirements documented", check: mentions("specification", "Requirements") },
  { category: "Specification", name: "User stories present", check: mentions("specification", "User Stories", "User Scenarios") },
  { category: "Specification", name: "Success criteria defined", check: mentions("specification", "Success Criteria") },
  {
    category: "Specification",
    name: "No technical details (HOW)",
    check: (artifacts) => !HOW_TERMS.some((term) => new RegExp(`\\b${term}\\b`, "i").test(artifacts.specification ?? ""))
  },
  { category: "Planning", name: "Tech stack specified", check: mentions("plan", "Tech Stack") },
  { category: "Planning", name: "Architecture documented", check: mentions("plan", "Architecture") },
  { category: "Planning", name: "Risks identified", check: mentions("plan", "Risk") },
  { category: "Planning", name: "File structure defined", check: mentions("plan", "File Structure") },
  { category: "Tasks", name: "Tasks broken down", check: mentions("tasks", "- [ ]") },
  { category: "Tasks", name: "Effort estimated", check: mentions("tasks", "Effort") },
  { category: "Tasks", name: "Dependencies identified", check: mentions("tasks", "Dependencies") },
  { category: "Tasks", name: "Acceptance criteria set", check: mentions("tasks", "Acceptance Criteria") }
];

export function assessArtifact(phase: Phase, content: string): ArtifactQuality {
  const sections = extractSections(content).filter((section) => section.level >= 2).length;
  const placeholders = placeholderMarkers(content).length;
  const issues: string[] = [];
  if (placeholders > 0) {
    issues.push(`${placeholders} placeholder(s) remaining`);
  }
  if (content.length < MIN_LENGTH) {
    issues.push("Content may be too brief");
  }
  if (sections < MIN_SECTIONS) {
    issues.push("May need more sections for clarity");
  }
  return {
    phase,
    length: content.length,
    lines: content.split(/\r?\n/).length,
    sections,
    placeholders,
    completeness: round1(Math.max(0, 100 - (issues.length / MAX_ISSUES) * 100)),
    issues
  };
}

export function runChecklist(artifacts: Artifacts): QualityChecklist {
  const items: ChecklistItem[] = CHECKLIST.map((definition) => ({
    category: definition.category,
    name: definition.name,
    passed: definition.check(artifacts)
  }));
  const passed = items.filter((item) => item.passed).length;
  return { items, passed, total: items.length, passRate: items.length === 0 ? 0 : round1((passed / items.length) * 100) };
}

// Artifacts that carry a `**Feature**: name` line must agree on the name.
export function featureNameIssues(artifacts: Artifacts): string[] {
  const names = new Set<string>();
  for (const phase of PHASES) {
    for (const line of (artifacts[phase] ?? "").split(/\r?\n/)) {
      const match = FEATURE_LINE.exec(line);
      if (match) {
        names.add(match[1]);
      }
    }
  }
  return names.size > 1 ? [`Inconsistent feature names across artifacts: ${[...names].join(", ")}`] : [];
}

/**
 * Per-artifact heuristics, the quality checklist and a weighted score:
 * 70% average completeness, 30% consistency (100 without issues, 80 with).
 */
export function assessQuality(artifacts: Artifacts, traceabilityGaps: number): QualityReport {
  const assessed = PHASES.flatMap((phase) => {
    const content = artifacts[phase];
    return content === undefined ? [] : [assessArtifact(phase, content)];
  });
  const consistencyIssues = featureNameIssues(artifacts);
  if (traceabilityGaps > 0) {
    consistencyIssues.push(`${traceabilityGaps} traceability gap(s) between artifacts`);
  }

  let qualityScore = 0;
  if (assessed.length > 0) {
    const completeness = assessed.reduce((sum, entry) => sum + entry.completeness, 0) / assessed.length;
    const consistency = consistencyIssues.length === 0 ? 100 : 80;
    qualityScore = round1(completeness * 0.7 + consistency * 0.3);
  }

  const recommendations: string[] = [];
  if (qualityScore < QUALITY_TARGET) {
    recommendations.push("Overall quality is below target. Review all artifacts.");
  }
  for (const entry of assessed) {
    if (entry.placeholders > 0) {
      recommendations.push(`Fill remaining placeholders in ${entry.phase}`);
    }
    if (entry.completeness < COMPLETENESS_TARGET) {
      recommendations.push(`Improve completeness of ${entry.phase}`);
    }
  }
  for (const issue of consistencyIssues) {
    recommendations.push(`Fix consistency: ${issue}`);
  }
  if (recommendations.length === 0) {
    recommendations.push("All artifacts meet quality standards.");
  }

  return { artifacts: assessed, consistencyIssues, checklist: runChecklist(artifacts), qualityScore, recommendations };
}
