import { WorkflowConfig } from "../config";
import { Generator } from "../providers/types";
import { classify } from "../router/trigger";
import { ArtifactStore, createArtifactStore } from "../store/artifact-store";
import { EffortLevel } from "../types";
import { createModuleLogger } from "../utils/logger";
import { deriveSlug } from "../utils/slug";
import { PhaseEventBus } from "./events";
import { PhaseMachine, RunOptions, WorkflowOutcome } from "./phase-machine";

const log = createModuleLogger("workflow");

export type StartOptions = RunOptions & {
  config: WorkflowConfig;
  generator: Generator;
  events?: PhaseEventBus;
  store?: ArtifactStore;
  slug?: string;
  now?: () => Date;
};

export function createPhaseMachine(
  store: ArtifactStore,
  generator: Generator,
  config: WorkflowConfig,
  extra: { events?: PhaseEventBus; effort?: EffortLevel; now?: () => Date } = {}
): PhaseMachine {
  return new PhaseMachine({
    store,
    generator,
    maxIterations: config.maxIterations,
    gate: config.gate,
    effort: extra.effort ?? config.client.effort,
    events: extra.events,
    now: extra.now
  });
}

/**
 * Classifies the request and, when it triggers, creates a feature and runs it.
 * Returns null when the request does not start the workflow.
 */
export async function startWorkflow(
  requestText: string,
  workspaceRef: string,
  options: StartOptions
): Promise<WorkflowOutcome | null> {
  const decision = classify(requestText, options.config.trigger);
  if (!decision.shouldRun) {
    log.info({ tokens: decision.tokenCount }, "request did not trigger the workflow");
    return null;
  }
  const store = options.store ?? createArtifactStore(workspaceRef, { now: options.now });
  const feature = await store.createFeature({
    slug: options.slug ?? deriveSlug(requestText),
    tier: decision.tier,
    request: requestText.trim()
  });
  log.info({ feature: feature.key, tier: decision.tier, signals: decision.signals }, "workflow started");
  const machine = createPhaseMachine(store, options.generator, options.config, {
    events: options.events,
    effort: options.effort,
    now: options.now
  });
  return machine.run(feature, {
    signal: options.signal,
    forceClarification: options.forceClarification,
    skipClarification: options.skipClarification,
    effort: options.effort
  });
}
