export { analyze, analyzeArtifacts, HOPS } from "./analysis/consistency";
export { CHECKLIST, assessArtifact, assessQuality, featureNameIssues, runChecklist } from "./analysis/quality";
export { CONFIG_FILE_NAME, configPath, defaultConfig, loadConfig, mergeConfig, parseConfig } from "./config";
export type { ClientConfig, GateConfig, TriggerConfig, WorkflowConfig } from "./config";
export * from "./errors";
export {
  HttpGenerationService,
  ResilientClient,
  backoffDelay,
  classifyJobFailure,
  createGenerationClient,
  parseRetryAfter
} from "./providers";
export type { GenerationRequest, GenerationService, Generator, JobStatus } from "./providers";
export { classify } from "./router/trigger";
export type { TriggerDecision } from "./router/trigger";
export { FsArtifactStore, STORE_DIR_NAME, createArtifactStore, featureKey } from "./store/artifact-store";
export type { ArtifactStore, CreateFeatureInput, FeatureRef, ListFeaturesOptions, PutArtifactOptions } from "./store/artifact-store";
export * from "./types";
export { deriveSlug, normalizeSlug } from "./utils/slug";
export { gateRuleIds, validate } from "./validation/gates";
export type { GateContext } from "./validation/gates";
export { clarificationMarkers, extractMarkers, extractReferences, placeholderMarkers } from "./validation/markers";
export { PhaseEventBus } from "./workflow/events";
export type { PhaseEvent, PhaseEventHandler, PhaseSubscription } from "./workflow/events";
export { GENERATION_UNAVAILABLE_RULE, PhaseMachine, canEnterPhase } from "./workflow/phase-machine";
export type { RunOptions, WorkflowOutcome } from "./workflow/phase-machine";
export { createPhaseMachine, startWorkflow } from "./workflow/start";
export type { StartOptions } from "./workflow/start";
