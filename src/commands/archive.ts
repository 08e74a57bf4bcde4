import { openContext, reportError } from "./context";

export async function runArchive(featureRef: string): Promise<void> {
  const context = openContext();
  if (!context) {
    return;
  }
  try {
    const feature = await context.store.archiveFeature(featureRef);
    console.log(`Archived ${feature.key}. Its number stays reserved and its slug is free again.`);
  } catch (error) {
    reportError(error);
  }
}
