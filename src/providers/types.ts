import { EffortLevel } from "../types";

export type GenerationRequest = {
  prompt: string;
  context: string;
  effort: EffortLevel;
};

export type JobStatus =
  | { status: "pending" }
  | { status: "done"; resultText: string }
  | { status: "failed"; errorCode?: string };

/**
 * One submit/poll round trip against the generation service. Implementations
 * throw the call errors from `errors.ts` so the client can tell transient
 * failures from permanent ones.
 */
export type GenerationService = {
  id: string;
  submit: (request: GenerationRequest, signal: AbortSignal) => Promise<string>;
  poll: (taskId: string, signal: AbortSignal) => Promise<JobStatus>;
};

export type GenerateOptions = {
  signal?: AbortSignal;
};

export type Generator = {
  generate: (request: GenerationRequest, options?: GenerateOptions) => Promise<string>;
};
