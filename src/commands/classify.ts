import { classify } from "../router/trigger";
import { deriveSlug } from "../utils/slug";
import { formatDecision } from "../ui/render";
import { openContext } from "./context";

export function runClassify(requestText: string): void {
  const context = openContext();
  if (!context) {
    return;
  }
  const decision = classify(requestText, context.config.trigger);
  console.log(formatDecision(decision));
  if (decision.shouldRun) {
    console.log(`Suggested slug: ${deriveSlug(requestText)}`);
  }
}
