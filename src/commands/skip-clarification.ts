import { openContext, openMachine, reportError } from "./context";

export async function runSkipClarification(featureRef: string): Promise<void> {
  const context = openContext();
  if (!context) {
    return;
  }
  try {
    const feature = await openMachine(context).skipClarification(featureRef);
    console.log(`${feature.key}: clarification ${feature.phaseStatus.clarification}.`);
  } catch (error) {
    reportError(error);
  }
}
