import { EffortLevel } from "../types";

export type RuntimeFlags = {
  workspace: string;
  effort?: EffortLevel;
};

const flags: RuntimeFlags = {
  workspace: process.cwd(),
  effort: undefined
};

export function parseEffort(input: unknown): EffortLevel | undefined {
  if (input === "low" || input === "medium" || input === "high") {
    return input;
  }
  return undefined;
}

export function setFlags(next: Partial<RuntimeFlags>): void {
  if ("workspace" in next && typeof next.workspace === "string" && next.workspace.trim()) {
    flags.workspace = next.workspace.trim();
  }
  if ("effort" in next) {
    flags.effort = parseEffort(next.effort);
  }
}

export function getFlags(): RuntimeFlags {
  return { ...flags };
}
