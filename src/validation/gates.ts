import { ComplexityTier, Phase, ValidationReport, Violation } from "../types";
import {
  Marker,
  Section,
  clarificationMarkers,
  extractReferences,
  extractSections,
  findSection,
  placeholderMarkers
} from "./markers";

export type GateContext = {
  iteration?: number;
  tier?: ComplexityTier;
  priorArtifacts?: Partial<Record<Phase, string>>;
  maxClarificationMarkers?: number;
  technologyTerms?: string[];
};

type ParsedArtifact = {
  content: string;
  sections: Section[];
  clarifications: Marker[];
  placeholders: Marker[];
};

type GateRule = {
  id: string;
  tiers?: ComplexityTier[];
  // Returns the violation message, or null when the rule holds.
  check: (artifact: ParsedArtifact, context: GateContext) => string | null;
};

const DEFAULT_MAX_CLARIFICATIONS = 3;

function describeMarkers(markers: Marker[]): string {
  return markers.map((marker) => `[${marker.label}] (line ${marker.line})`).join(", ");
}

function requireSection(id: string, label: string, ...keywords: string[]): GateRule {
  return {
    id,
    check: ({ sections }) => (findSection(sections, ...keywords) ? null : `Missing required section: ${label}`)
  };
}

function commonRules(phase: Phase): GateRule[] {
  return [
    {
      id: `${phase}.non-empty`,
      check: ({ content }) => (content.trim().length > 0 ? null : "Artifact is empty.")
    },
    {
      id: `${phase}.no-placeholders`,
      check: ({ placeholders }) =>
        placeholders.length === 0 ? null : `Unfilled template placeholders: ${describeMarkers(placeholders)}`
    }
  ];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function findTechnologyTerms(content: string, terms: string[]): string[] {
  return terms.filter((term) => new RegExp(`\\b${escapeRegExp(term)}\\b`, "i").test(content));
}

function isListItem(line: string): boolean {
  return /^\s*(?:[-*+]|\d+[.)])\s+\S/.test(line);
}

const CONSTITUTION_RULES: GateRule[] = [
  requireSection("constitution.principles-section", "Principles", "principle"),
  {
    id: "constitution.version",
    check: ({ content }) =>
      /Version\W{0,4}\d+\.\d+\.\d+/i.test(content) ? null : "Version not found or not in x.y.z format."
  },
  {
    id: "constitution.dated",
    check: ({ content }) => (/\b\d{4}-\d{2}-\d{2}\b/.test(content) ? null : "No date in ISO format (YYYY-MM-DD).")
  },
  { ...requireSection("constitution.governance-section", "Governance", "governance"), tiers: ["complex"] }
];

const SPECIFICATION_RULES: GateRule[] = [
  requireSection("specification.user-scenarios", "User Scenarios", "user scenario", "user stor"),
  {
    id: "specification.requirements",
    check: ({ sections }) => {
      const section = findSection(sections, "requirement");
      if (!section) {
        return "Missing required section: Requirements";
      }
      return extractReferences(section.body, "requirement").length > 0
        ? null
        : "Requirements section lists no requirement identifiers (FR-001 or R1).";
    }
  },
  {
    id: "specification.success-criteria",
    check: ({ sections }) => {
      const section = findSection(sections, "success criteria");
      if (!section) {
        return "Missing required section: Success Criteria";
      }
      const measurable = section.body.split(/\r?\n/).some((line) => isListItem(line) && /\d/.test(line));
      return measurable ? null : "Success Criteria lists no measurable criterion (a list item with a number).";
    }
  },
  {
    id: "specification.no-implementation-details",
    check: ({ content }, context) => {
      const found = findTechnologyTerms(content, context.technologyTerms ?? []);
      return found.length === 0
        ? null
        : `Specification names implementation details (${found.join(", ")}). Describe WHAT and WHY only.`;
    }
  },
  {
    id: "specification.clarification-limit",
    check: ({ clarifications }, context) => {
      const limit = context.maxClarificationMarkers ?? DEFAULT_MAX_CLARIFICATIONS;
      return clarifications.length <= limit
        ? null
        : `Too many clarification markers: ${clarifications.length} (max ${limit}).`;
    }
  },
  { ...requireSection("specification.edge-cases", "Edge Cases", "edge case"), tiers: ["complex"] }
];

const CLARIFICATION_RULES: GateRule[] = [
  requireSection("clarification.clarifications-section", "Clarifications", "clarification"),
  {
    id: "clarification.resolved",
    check: ({ clarifications }) =>
      clarifications.length === 0 ? null : `Unresolved clarification markers remain: ${describeMarkers(clarifications)}`
  },
  {
    id: "clarification.answers",
    check: ({ content }, context) => {
      const answered = content.split(/\r?\n/).filter((line) => /\bA\d*\s*:\s*\S/.test(line)).length;
      const open = clarificationMarkers(context.priorArtifacts?.specification ?? "").length;
      const required = Math.max(1, open);
      return answered >= required ? null : `Expected at least ${required} answered question(s), found ${answered}.`;
    }
  }
];

const PLAN_RULES: GateRule[] = [
  requireSection("plan.tech-stack", "Tech Stack", "tech stack", "technology stack"),
  requireSection("plan.architecture", "Architecture", "architecture"),
  {
    id: "plan.components",
    check: ({ content }) =>
      extractReferences(content, "component").length > 0 ? null : "Plan names no component identifiers (COMP-001 or C1)."
  },
  {
    id: "plan.traces-requirements",
    check: ({ content }, context) => {
      const required = extractReferences(context.priorArtifacts?.specification ?? "", "requirement");
      if (required.length === 0) {
        return null;
      }
      const referenced = new Set(extractReferences(content, "requirement"));
      const covered = required.filter((id) => referenced.has(id)).length;
      return covered * 2 >= required.length
        ? null
        : `Plan addresses only ${covered}/${required.length} specification requirements.`;
    }
  },
  { ...requireSection("plan.file-structure", "File Structure", "file structure", "project structure"), tiers: ["complex"] }
];

const TASKS_RULES: GateRule[] = [
  {
    id: "tasks.checklist",
    check: ({ content }) => {
      const items = content
        .split(/\r?\n/)
        .filter((line) => /^\s*[-*]\s+\[[ xX]\]\s+/.test(line) && extractReferences(line, "task").length > 0);
      return items.length > 0 ? null : "No checkbox tasks with task identifiers (- [ ] T001 ...).";
    }
  },
  {
    id: "tasks.effort",
    check: ({ content }) => (/\beffort\b/i.test(content) ? null : "Missing effort estimation for tasks.")
  },
  {
    id: "tasks.acceptance-criteria",
    check: ({ content }) => (/acceptance criteria/i.test(content) ? null : "Missing acceptance criteria for tasks.")
  },
  {
    id: "tasks.traces-components",
    check: ({ content }, context) => {
      const components = extractReferences(context.priorArtifacts?.plan ?? "", "component");
      if (components.length === 0) {
        return null;
      }
      const referenced = new Set(extractReferences(content, "component"));
      return components.some((id) => referenced.has(id)) ? null : "Tasks reference none of the plan components.";
    }
  },
  {
    id: "tasks.dependencies",
    tiers: ["complex"],
    check: ({ content }) => (/\bdependenc(y|ies)\b/i.test(content) ? null : "Missing task dependencies.")
  }
];

const IMPLEMENTATION_RULES: GateRule[] = [
  requireSection("implementation.progress-section", "Progress", "progress", "status"),
  {
    id: "implementation.tracks-tasks",
    check: ({ content }, context) => {
      const referenced = new Set(extractReferences(content, "task"));
      const known = extractReferences(context.priorArtifacts?.tasks ?? "", "task");
      if (known.length === 0) {
        return referenced.size > 0 ? null : "Implementation log references no task identifiers.";
      }
      return known.some((id) => referenced.has(id)) ? null : "Implementation log references none of the planned tasks.";
    }
  }
];

const PHASE_RULES: Record<Phase, GateRule[]> = {
  constitution: CONSTITUTION_RULES,
  specification: SPECIFICATION_RULES,
  clarification: CLARIFICATION_RULES,
  plan: PLAN_RULES,
  tasks: TASKS_RULES,
  implementation: IMPLEMENTATION_RULES
};

export function gateRuleIds(phase: Phase, tier?: ComplexityTier): string[] {
  return [...commonRules(phase), ...PHASE_RULES[phase]]
    .filter((rule) => !rule.tiers || (tier !== undefined && rule.tiers.includes(tier)))
    .map((rule) => rule.id);
}

export function validate(phase: Phase, content: string, context: GateContext = {}): ValidationReport {
  const artifact: ParsedArtifact = {
    content,
    sections: extractSections(content),
    clarifications: clarificationMarkers(content),
    placeholders: placeholderMarkers(content)
  };
  const violations: Violation[] = [];
  for (const rule of [...commonRules(phase), ...PHASE_RULES[phase]]) {
    if (rule.tiers && (context.tier === undefined || !rule.tiers.includes(context.tier))) {
      continue;
    }
    const message = rule.check(artifact, context);
    if (message !== null) {
      violations.push({ ruleId: rule.id, message });
    }
  }
  return {
    phase,
    iteration: context.iteration ?? 1,
    passed: violations.length === 0,
    violations
  };
}
