import fs from "fs";
import os from "os";
import path from "path";
import { Phase } from "../types";

// Contents that pass every gate rule for any tier, given the other entries as prior artifacts.
export const PASSING: Record<Phase, string> = {
  constitution: [
    "# Constitution",
    "",
    "Version: 1.0.0",
    "Ratified: 2026-01-15",
    "",
    "## Core Principles",
    "- Keep features small.",
    "",
    "## Governance",
    "- Amendments need one review."
  ].join("\n"),
  specification: [
    "# Feature Specification",
    "",
    "## User Scenarios",
    "- A visitor signs up and sees a personal dashboard.",
    "",
    "## Requirements",
    "- FR-001: Visitors can create an account.",
    "- FR-002: Members can reset a forgotten password.",
    "",
    "## Success Criteria",
    "- SC-001: 95% of visitors finish sign-up in under 2 minutes.",
    "",
    "## Edge Cases",
    "- A visitor signs up twice with the same email."
  ].join("\n"),
  clarification: ["## Clarifications", "Q: Which roles exist?", "A: Admins and members."].join("\n"),
  plan: [
    "## Tech Stack",
    "- TypeScript on Node.js",
    "",
    "## Architecture",
    "- COMP-001 Accounts module covers FR-001, FR-002 and SC-001.",
    "",
    "## File Structure",
    "- src/accounts/"
  ].join("\n"),
  tasks: [
    "## Tasks",
    "- [ ] T001 Build the sign-up flow (COMP-001)",
    "  - Effort: medium",
    "  - Acceptance Criteria: a visitor can sign up",
    "  - Dependencies: none"
  ].join("\n"),
  implementation: ["## Progress", "- T001 done: sign-up flow shipped"].join("\n")
};

export function withoutSection(content: string, heading: string): string {
  const lines = content.split("\n");
  const start = lines.indexOf(heading);
  if (start === -1) {
    return content;
  }
  let end = start + 1;
  while (end < lines.length && !lines[end].startsWith("## ")) {
    end += 1;
  }
  return [...lines.slice(0, start), ...lines.slice(end)].join("\n");
}

export function makeTempWorkspace(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `specloop-${prefix}-`));
}

export function removeTempWorkspace(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
