import { classify } from "../router/trigger";
import { formatDecision, formatOutcome } from "../ui/render";
import { startWorkflow } from "../workflow/start";
import { createGenerator, createRenderingBus, openContext, reportCompletion, reportError, withCancellation } from "./context";

export type StartCommandOptions = {
  slug?: string;
  clarify?: boolean;
  skipClarification?: boolean;
};

export async function runStart(requestText: string, options: StartCommandOptions = {}): Promise<void> {
  const context = openContext();
  if (!context) {
    return;
  }
  if (!requestText.trim()) {
    console.log("Describe what to build, e.g. specloop start create a todo app with login");
    process.exitCode = 1;
    return;
  }
  try {
    const outcome = await withCancellation((signal) =>
      startWorkflow(requestText, context.workspace, {
        config: context.config,
        store: context.store,
        generator: createGenerator(context.config),
        events: createRenderingBus(),
        slug: options.slug,
        forceClarification: options.clarify,
        skipClarification: options.skipClarification,
        effort: context.effort,
        signal
      })
    );
    if (!outcome) {
      console.log(formatDecision(classify(requestText, context.config.trigger)));
      return;
    }
    formatOutcome(outcome).forEach((line) => console.log(line));
    await reportCompletion(context, outcome);
    if (outcome.status === "blocked") {
      process.exitCode = 2;
    }
  } catch (error) {
    reportError(error);
  }
}
