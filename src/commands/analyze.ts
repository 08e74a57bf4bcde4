import { analyze } from "../analysis/consistency";
import { formatConsistencyReport } from "../ui/render";
import { openContext, reportError } from "./context";

export async function runAnalyze(featureRef: string, save = false): Promise<void> {
  const context = openContext();
  if (!context) {
    return;
  }
  try {
    const report = await analyze(context.store, featureRef);
    formatConsistencyReport(report).forEach((line) => console.log(line));
    if (save) {
      const file = await context.store.saveConsistencyReport(report.featureKey, report);
      console.log(`Saved: ${file}`);
    }
  } catch (error) {
    reportError(error);
  }
}
