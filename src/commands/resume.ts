import { formatOutcome } from "../ui/render";
import { createRenderingBus, openContext, openMachine, reportCompletion, reportError, withCancellation } from "./context";

export type ResumeCommandOptions = {
  clarify?: boolean;
  skipClarification?: boolean;
};

export async function runResume(featureRef: string, options: ResumeCommandOptions = {}): Promise<void> {
  const context = openContext();
  if (!context) {
    return;
  }
  try {
    const machine = openMachine(context, createRenderingBus());
    const outcome = await withCancellation((signal) =>
      machine.run(featureRef, {
        signal,
        forceClarification: options.clarify,
        skipClarification: options.skipClarification,
        effort: context.effort
      })
    );
    formatOutcome(outcome).forEach((line) => console.log(line));
    await reportCompletion(context, outcome);
    if (outcome.status === "blocked") {
      process.exitCode = 2;
    }
  } catch (error) {
    reportError(error);
  }
}
