import { analyze } from "../analysis/consistency";
import { WorkflowConfig, loadConfig } from "../config";
import { getFlags } from "../context/flags";
import { SpecloopError, describeError, printError } from "../errors";
import { createGenerationClient } from "../providers";
import { Generator } from "../providers/types";
import { ArtifactStore, createArtifactStore } from "../store/artifact-store";
import { EffortLevel } from "../types";
import { formatPhaseEvent, formatQuality } from "../ui/render";
import { PhaseEventBus } from "../workflow/events";
import { PhaseMachine, WorkflowOutcome } from "../workflow/phase-machine";
import { createPhaseMachine } from "../workflow/start";

export type CommandContext = {
  workspace: string;
  config: WorkflowConfig;
  store: ArtifactStore;
  effort: EffortLevel;
};

export function reportError(error: unknown): void {
  if (error instanceof SpecloopError) {
    printError(error.code, error.message);
  } else {
    printError("SPL-9000", describeError(error));
  }
  process.exitCode = 1;
}

export function openContext(): CommandContext | null {
  const flags = getFlags();
  try {
    const config = loadConfig(flags.workspace);
    return {
      workspace: flags.workspace,
      config,
      store: createArtifactStore(flags.workspace),
      effort: flags.effort ?? config.client.effort
    };
  } catch (error) {
    reportError(error);
    return null;
  }
}

export function createGenerator(config: WorkflowConfig): Generator {
  const apiKey = process.env[config.client.apiKeyEnv]?.trim();
  return createGenerationClient(config.client, apiKey || undefined);
}

export function createRenderingBus(): PhaseEventBus {
  const events = new PhaseEventBus();
  events.subscribe((event) => {
    formatPhaseEvent(event).forEach((line) => console.log(line));
  });
  return events;
}

export function openMachine(context: CommandContext, events?: PhaseEventBus): PhaseMachine {
  return createPhaseMachine(context.store, createGenerator(context.config), context.config, {
    events,
    effort: context.effort
  });
}

// Ctrl+C aborts the in-flight generation; the phase stays resumable.
export async function withCancellation<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = (): void => {
    console.log("Cancelling...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

// A completed workflow ends with the quality analysis, saved beside the feature.
export async function reportCompletion(context: CommandContext, outcome: WorkflowOutcome): Promise<void> {
  if (outcome.status !== "completed") {
    return;
  }
  const report = await analyze(context.store, outcome.feature);
  formatQuality(report.quality).forEach((line) => console.log(line));
  const file = await context.store.saveConsistencyReport(outcome.feature, report);
  console.log(`Analysis saved: ${file}`);
}
