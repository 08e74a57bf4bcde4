import { formatFeatureLine } from "../ui/render";
import { openContext, reportError } from "./context";

export async function runList(includeArchived = false): Promise<void> {
  const context = openContext();
  if (!context) {
    return;
  }
  try {
    let count = 0;
    for await (const feature of context.store.listFeatures({ includeArchived })) {
      console.log(formatFeatureLine(feature));
      count += 1;
    }
    if (count === 0) {
      console.log("- none");
    }
  } catch (error) {
    reportError(error);
  }
}
