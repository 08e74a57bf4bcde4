import { naturalCompare } from "../utils/text";

export const CLARIFICATION_LABEL = "NEEDS CLARIFICATION";

export type Marker = {
  label: string;
  detail: string | null;
  line: number;
  column: number;
};

export type Section = {
  heading: string;
  level: number;
  line: number;
  body: string;
};

export type ReferenceKind = "requirement" | "success-criterion" | "component" | "task";

export const REFERENCE_PATTERNS: Record<ReferenceKind, RegExp> = {
  requirement: /\b(?:FR-\d+|R\d+)\b/g,
  "success-criterion": /\bSC-\d+\b/g,
  component: /\b(?:COMP-\d+|C\d+)\b/g,
  task: /\bT-?\d+\b/g
};

const MARKER_PATTERN = /\[([A-Z][A-Z0-9 _-]*[A-Z0-9])(?:\s*:\s*([^\]]*))?\]/g;

export function extractMarkers(content: string): Marker[] {
  const markers: Marker[] = [];
  const lines = content.split(/\r?\n/);
  lines.forEach((text, index) => {
    for (const match of text.matchAll(MARKER_PATTERN)) {
      const detail = match[2]?.trim();
      markers.push({
        label: match[1],
        detail: detail ? detail : null,
        line: index + 1,
        column: (match.index ?? 0) + 1
      });
    }
  });
  return markers;
}

export function clarificationMarkers(content: string): Marker[] {
  return extractMarkers(content).filter((marker) => marker.label === CLARIFICATION_LABEL);
}

// Bare upper-case labels left over from a template, e.g. [FEATURE_NAME].
export function placeholderMarkers(content: string): Marker[] {
  return extractMarkers(content).filter(
    (marker) => marker.label !== CLARIFICATION_LABEL && marker.detail === null && /^[A-Z_]+$/.test(marker.label)
  );
}

export function extractSections(content: string): Section[] {
  const lines = content.split(/\r?\n/);
  const headings: Array<{ heading: string; level: number; line: number }> = [];
  let inFence = false;
  lines.forEach((text, index) => {
    if (/^\s*(```|~~~)/.test(text)) {
      inFence = !inFence;
      return;
    }
    const match = inFence ? null : /^(#{1,6})\s+(.+?)\s*#*\s*$/.exec(text);
    if (match) {
      headings.push({ heading: match[2], level: match[1].length, line: index + 1 });
    }
  });
  return headings.map((entry, position) => {
    const next = headings.slice(position + 1).find((candidate) => candidate.level <= entry.level);
    const end = next ? next.line - 1 : lines.length;
    return { ...entry, body: lines.slice(entry.line, end).join("\n") };
  });
}

export function findSection(sections: Section[], ...keywords: string[]): Section | undefined {
  const wanted = keywords.map((keyword) => keyword.toLowerCase());
  return sections.find((section) => {
    const heading = section.heading.toLowerCase();
    return wanted.some((keyword) => heading.includes(keyword));
  });
}

export function extractReferences(content: string, kind: ReferenceKind): string[] {
  const found = new Set<string>();
  for (const match of content.matchAll(REFERENCE_PATTERNS[kind])) {
    found.add(match[0]);
  }
  return Array.from(found).sort(naturalCompare);
}
