import { TriggerDecision } from "../router/trigger";
import { ConsistencyReport, Feature, PHASES, QualityReport, ValidationRecord } from "../types";
import { PhaseEvent } from "../workflow/events";
import { WorkflowOutcome } from "../workflow/phase-machine";

export function formatPhaseEvent(event: PhaseEvent): string[] {
  const prefix = `[${event.featureKey}] ${event.phase}`;
  if (event.type === "phase.status") {
    return [`${prefix}: ${event.status}`];
  }
  const violations = event.violations ?? [];
  if (violations.length === 0) {
    return [`${prefix} iteration ${event.iteration}: passed`];
  }
  return [
    `${prefix} iteration ${event.iteration}: failed (${violations.length} violation(s))`,
    ...violations.map((violation) => `  - ${violation.ruleId}: ${violation.message}`)
  ];
}

export function formatHistory(records: ValidationRecord[]): string[] {
  return records.flatMap((record) => {
    const version = record.artifactVersion === null ? "no artifact" : `v${record.artifactVersion}`;
    const head = `  iteration ${record.iteration} (${version}): ${record.passed ? "passed" : "failed"}`;
    return [head, ...record.violations.map((violation) => `    - ${violation.ruleId}: ${violation.message}`)];
  });
}

export function formatOutcome(outcome: WorkflowOutcome): string[] {
  const key = outcome.feature.key;
  if (outcome.status === "completed") {
    return [`${key}: all phases passed or skipped.`];
  }
  if (outcome.status === "cancelled") {
    return [`${key}: cancelled. Run "specloop resume ${key}" to continue.`];
  }
  const phase = outcome.blockedPhase ?? "unknown";
  return [
    `${key}: BLOCKED at ${phase}. Validation history:`,
    ...formatHistory(outcome.history ?? []),
    `Fix the inputs, raise max_iterations, or run "specloop restart ${key} --from ${phase}".`
  ];
}

export function settledCount(feature: Feature): number {
  return PHASES.filter((phase) => ["PASSED", "SKIPPED"].includes(feature.phaseStatus[phase])).length;
}

export function formatFeatureLine(feature: Feature): string {
  const archived = feature.archived ? " (archived)" : "";
  return `${feature.key}  ${feature.tier}  ${settledCount(feature)}/${PHASES.length} phases settled${archived}`;
}

export function formatFeatureStatus(feature: Feature): string[] {
  const width = Math.max(...PHASES.map((phase) => phase.length));
  return [
    `${feature.key} (tier ${feature.tier})${feature.archived ? " archived" : ""}`,
    ...PHASES.map(
      (phase) => `  ${phase.padEnd(width)}  ${feature.phaseStatus[phase].padEnd(11)}  iterations ${feature.iterations[phase]}`
    )
  ];
}

export function formatConsistencyReport(report: ConsistencyReport): string[] {
  const lines = [`Consistency of ${report.featureKey}:`];
  for (const entry of report.coverage) {
    const percent = Math.round(entry.ratio * 100);
    lines.push(
      `  ${entry.hop} (${entry.sourceArtifact} -> ${entry.targetArtifact}): ${entry.covered}/${entry.total} covered (${percent}%)`
    );
  }
  if (report.missingArtifacts.length > 0) {
    lines.push(`  not evaluated, missing artifacts: ${report.missingArtifacts.join(", ")}`);
  }
  if (report.gaps.length === 0) {
    lines.push("  no gaps");
  } else {
    lines.push("  gaps:");
    for (const gap of report.gaps) {
      lines.push(`    - ${gap.missingReference} (${gap.sourceArtifact} -> ${gap.targetArtifact})`);
    }
  }
  return [...lines, ...formatQuality(report.quality)];
}

export function formatQuality(quality: QualityReport): string[] {
  const lines = [
    `Quality score: ${quality.qualityScore}%`,
    `  checklist: ${quality.checklist.passed}/${quality.checklist.total} passed (${quality.checklist.passRate}%)`
  ];
  for (const entry of quality.artifacts) {
    const issues = entry.issues.length > 0 ? ` (${entry.issues.join("; ")})` : "";
    lines.push(`  ${entry.phase}: ${entry.completeness}% complete${issues}`);
  }
  lines.push("  recommendations:");
  lines.push(...quality.recommendations.map((recommendation) => `    - ${recommendation}`));
  return lines;
}

export function formatDecision(decision: TriggerDecision): string {
  if (!decision.shouldRun) {
    return `No trigger term found (${decision.tokenCount} tokens); the workflow would not start.`;
  }
  return `Triggers the workflow: tier ${decision.tier}, ${decision.tokenCount} tokens, signals ${decision.signals.join(", ")}.`;
}
