import { GenerationRequest } from "../providers/types";
import { loadTemplate, renderTemplate } from "../templates/render";
import { Artifact, EffortLevel, Feature, PHASES, Phase, Violation } from "../types";

export type PromptInput = {
  feature: Feature;
  phase: Phase;
  priorArtifacts: Partial<Record<Phase, Artifact>>;
  corrections: { iteration: number; violations: Violation[] } | null;
  maxClarificationMarkers: number;
  effort: EffortLevel;
  today: string;
};

export function formatViolations(violations: Violation[]): string {
  return violations.map((violation) => `- ${violation.ruleId}: ${violation.message}`).join("\n");
}

export function buildContext(priorArtifacts: Partial<Record<Phase, Artifact>>): string {
  const blocks: string[] = [];
  for (const phase of PHASES) {
    const artifact = priorArtifacts[phase];
    if (artifact) {
      blocks.push(`### ${phase} (version ${artifact.version})\n\n${artifact.content.trim()}`);
    }
  }
  return blocks.join("\n\n");
}

export function buildGenerationRequest(input: PromptInput): GenerationRequest {
  const { feature, phase } = input;
  let prompt = renderTemplate(loadTemplate(phase), {
    feature_key: feature.key,
    request: feature.request,
    tier: feature.tier,
    today: input.today,
    max_clarifications: String(input.maxClarificationMarkers)
  });
  if (input.corrections && input.corrections.violations.length > 0) {
    prompt += renderTemplate(loadTemplate("revision"), {
      iteration: String(input.corrections.iteration),
      violations: formatViolations(input.corrections.violations)
    });
  }
  return {
    prompt,
    context: buildContext(input.priorArtifacts),
    effort: input.effort
  };
}
