import { printError } from "../errors";
import { isPhase } from "../types";
import { formatOutcome } from "../ui/render";
import { createRenderingBus, openContext, openMachine, reportCompletion, reportError, withCancellation } from "./context";

export async function runRestart(featureRef: string, fromPhase = "constitution"): Promise<void> {
  if (!isPhase(fromPhase)) {
    printError("SPL-1002", `Unknown phase: ${fromPhase}`);
    process.exitCode = 1;
    return;
  }
  const context = openContext();
  if (!context) {
    return;
  }
  try {
    const machine = openMachine(context, createRenderingBus());
    const outcome = await withCancellation((signal) =>
      machine.restart(featureRef, fromPhase, { signal, effort: context.effort })
    );
    console.log(`Restarted ${outcome.feature.key} from ${fromPhase}. Artifacts and validation history are kept.`);
    formatOutcome(outcome).forEach((line) => console.log(line));
    await reportCompletion(context, outcome);
    if (outcome.status === "blocked") {
      process.exitCode = 2;
    }
  } catch (error) {
    reportError(error);
  }
}
