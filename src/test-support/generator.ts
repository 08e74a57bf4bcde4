import { GenerateOptions, GenerationRequest, Generator } from "../providers/types";
import { Phase } from "../types";
import { PASSING } from "./artifacts";

const OPENINGS: Array<[Phase, string]> = [
  ["constitution", "You are writing the constitution"],
  ["specification", "You are writing the feature specification"],
  ["clarification", "You are resolving the open questions"],
  ["plan", "You are writing the implementation plan"],
  ["tasks", "You are breaking the plan"],
  ["implementation", "You are tracking the implementation"]
];

export function phaseOfPrompt(prompt: string): Phase {
  const found = OPENINGS.find(([, opening]) => prompt.startsWith(opening));
  if (!found) {
    throw new Error(`Unrecognized prompt: ${prompt.slice(0, 60)}`);
  }
  return found[0];
}

export type Reply = string | Error | ((request: GenerationRequest, options: GenerateOptions) => string);

/** Answers each phase from its script, then with content that passes the gate. */
export class FakeGenerator implements Generator {
  readonly calls: Array<{ phase: Phase; request: GenerationRequest }> = [];
  private readonly scripts: Partial<Record<Phase, Reply[]>>;

  constructor(scripts: Partial<Record<Phase, Reply[]>> = {}) {
    this.scripts = scripts;
  }

  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<string> {
    const phase = phaseOfPrompt(request.prompt);
    this.calls.push({ phase, request });
    const reply = this.scripts[phase]?.shift() ?? PASSING[phase];
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === "function" ? reply(request, options) : reply;
  }

  phases(): Phase[] {
    return this.calls.map((call) => call.phase);
  }

  promptsFor(phase: Phase): string[] {
    return this.calls.filter((call) => call.phase === phase).map((call) => call.request.prompt);
  }
}
