import { PHASES } from "../types";
import { formatFeatureLine, formatFeatureStatus, formatHistory } from "../ui/render";
import { openContext, reportError } from "./context";

export async function runStatus(featureRef?: string): Promise<void> {
  const context = openContext();
  if (!context) {
    return;
  }
  try {
    if (!featureRef) {
      let count = 0;
      for await (const feature of context.store.listFeatures()) {
        console.log(formatFeatureLine(feature));
        count += 1;
      }
      if (count === 0) {
        console.log("No active features. Start one with: specloop start <request>");
      }
      return;
    }
    const feature = await context.store.getFeature(featureRef);
    formatFeatureStatus(feature).forEach((line) => console.log(line));
    for (const phase of PHASES) {
      const history = await context.store.getValidationHistory(feature, phase);
      if (history.length > 0 && feature.phaseStatus[phase] !== "PASSED") {
        console.log(`${phase} validation history:`);
        formatHistory(history).forEach((line) => console.log(line));
      }
    }
  } catch (error) {
    reportError(error);
  }
}
