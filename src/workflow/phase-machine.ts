import { GateConfig } from "../config";
import { CancelledError, PhaseOrderError, TransientCallError } from "../errors";
import { GenerateOptions, GenerationRequest, Generator } from "../providers/types";
import { ArtifactStore, FeatureRef } from "../store/artifact-store";
import {
  Artifact,
  EffortLevel,
  Feature,
  PHASES,
  Phase,
  PhaseStatus,
  ValidationRecord,
  ValidationReport,
  Violation
} from "../types";
import { createModuleLogger } from "../utils/logger";
import { GateContext, validate } from "../validation/gates";
import { clarificationMarkers } from "../validation/markers";
import { PhaseEventBus, PhaseEventType } from "./events";
import { buildGenerationRequest } from "./prompts";

const log = createModuleLogger("phase-machine");

export const GENERATION_UNAVAILABLE_RULE = "generation.unavailable";

export type WorkflowOutcome = {
  status: "completed" | "blocked" | "cancelled";
  feature: Feature;
  blockedPhase?: Phase;
  history?: ValidationRecord[];
};

export type RunOptions = {
  signal?: AbortSignal;
  forceClarification?: boolean;
  skipClarification?: boolean;
  effort?: EffortLevel;
};

export type PhaseMachineOptions = {
  store: ArtifactStore;
  generator: Generator;
  maxIterations: number;
  gate: GateConfig;
  effort: EffortLevel;
  events?: PhaseEventBus;
  now?: () => Date;
};

type PhaseResult =
  | { status: "passed"; feature: Feature }
  | { status: "blocked"; feature: Feature; history: ValidationRecord[] }
  | { status: "cancelled"; feature: Feature };

const SETTLED: readonly PhaseStatus[] = ["PASSED", "SKIPPED"];

export function canEnterPhase(feature: Feature, target: Phase): { ok: boolean; reason?: string } {
  const index = PHASES.indexOf(target);
  for (let i = 0; i < index; i += 1) {
    const prev = PHASES[i];
    if (!SETTLED.includes(feature.phaseStatus[prev])) {
      return { ok: false, reason: `Cannot enter ${target}; prerequisite phase ${prev} is ${feature.phaseStatus[prev]}.` };
    }
  }
  return { ok: true };
}

export function findBlockedPhase(feature: Feature): Phase | undefined {
  return PHASES.find((phase) => feature.phaseStatus[phase] === "BLOCKED");
}

/**
 * Drives one feature through the ordered phases. Phases of a feature run
 * strictly one after another; different features may run in parallel against
 * the same store.
 */
export class PhaseMachine {
  private readonly store: ArtifactStore;
  private readonly generator: Generator;
  private readonly maxIterations: number;
  private readonly gate: GateConfig;
  private readonly effort: EffortLevel;
  private readonly events?: PhaseEventBus;
  private readonly now: () => Date;

  constructor(options: PhaseMachineOptions) {
    this.store = options.store;
    this.generator = options.generator;
    this.maxIterations = Math.max(1, options.maxIterations);
    this.gate = options.gate;
    this.effort = options.effort;
    this.events = options.events;
    this.now = options.now ?? (() => new Date());
  }

  async run(ref: FeatureRef, options: RunOptions = {}): Promise<WorkflowOutcome> {
    let feature = await this.store.getFeature(ref);
    const blocked = findBlockedPhase(feature);
    if (blocked) {
      log.info({ feature: feature.key, phase: blocked }, "feature is blocked, restart required");
      return {
        status: "blocked",
        feature,
        blockedPhase: blocked,
        history: await this.store.getValidationHistory(feature, blocked)
      };
    }

    for (const phase of PHASES) {
      if (SETTLED.includes(feature.phaseStatus[phase])) {
        continue;
      }
      if (phase === "clarification" && !(await this.clarificationApplies(feature, options))) {
        feature = await this.transition(feature, phase, "SKIPPED");
        continue;
      }
      const result = await this.runPhase(feature, phase, options);
      feature = result.feature;
      if (result.status === "blocked") {
        return { status: "blocked", feature, blockedPhase: phase, history: result.history };
      }
      if (result.status === "cancelled") {
        log.info({ feature: feature.key, phase }, "run cancelled");
        return { status: "cancelled", feature };
      }
    }
    log.info({ feature: feature.key }, "workflow completed");
    return { status: "completed", feature };
  }

  /** Resets `fromPhase` and every later phase, then runs the feature again from the first unsettled phase. */
  async restart(ref: FeatureRef, fromPhase: Phase = "constitution", options: RunOptions = {}): Promise<WorkflowOutcome> {
    const feature = await this.reset(ref, fromPhase);
    return this.run(feature, options);
  }

  async reset(ref: FeatureRef, fromPhase: Phase = "constitution"): Promise<Feature> {
    const start = PHASES.indexOf(fromPhase);
    const reset = PHASES.slice(start);
    const feature = await this.store.updateFeature(ref, (current) => {
      const phaseStatus = { ...current.phaseStatus };
      const iterations = { ...current.iterations };
      for (const phase of reset) {
        phaseStatus[phase] = "PENDING";
        iterations[phase] = 0;
      }
      return { ...current, phaseStatus, iterations };
    });
    for (const phase of reset) {
      this.emit("phase.status", feature, phase, 0);
    }
    log.info({ feature: feature.key, from: fromPhase }, "feature reset");
    return feature;
  }

  async skipClarification(ref: FeatureRef): Promise<Feature> {
    const feature = await this.store.getFeature(ref);
    return this.transition(feature, "clarification", "SKIPPED");
  }

  private async clarificationApplies(feature: Feature, options: RunOptions): Promise<boolean> {
    if (options.skipClarification) {
      return false;
    }
    if (options.forceClarification || feature.tier === "complex") {
      return true;
    }
    const specification = await this.store.findLatest(feature, "specification");
    return specification !== null && clarificationMarkers(specification.content).length > 0;
  }

  private async runPhase(current: Feature, phase: Phase, options: RunOptions): Promise<PhaseResult> {
    let feature = current;
    const entry = canEnterPhase(feature, phase);
    if (!entry.ok) {
      throw new PhaseOrderError(entry.reason ?? `Cannot enter ${phase}.`);
    }
    if (feature.phaseStatus[phase] === "PENDING") {
      feature = await this.transition(feature, phase, "IN_PROGRESS", { resetIterations: true });
    }

    const prior = await this.priorArtifacts(feature, phase);
    const priorContents: Partial<Record<Phase, string>> = {};
    for (const earlier of PHASES) {
      const artifact = prior[earlier];
      if (artifact) {
        priorContents[earlier] = artifact.content;
      }
    }
    const gateContext = (iteration: number): GateContext => ({
      iteration,
      tier: feature.tier,
      priorArtifacts: priorContents,
      maxClarificationMarkers: this.gate.maxClarificationMarkers,
      technologyTerms: this.gate.technologyTerms
    });

    if (phase === "constitution" && feature.iterations[phase] < this.maxIterations) {
      const reused = await this.reuseConstitution(feature, gateContext(feature.iterations[phase] + 1));
      if (reused) {
        return { status: "passed", feature: reused };
      }
    }

    let corrections = await this.lastCorrections(feature, phase);
    while (feature.iterations[phase] < this.maxIterations) {
      if (options.signal?.aborted) {
        return { status: "cancelled", feature };
      }
      const iteration = feature.iterations[phase] + 1;
      const request = buildGenerationRequest({
        feature,
        phase,
        priorArtifacts: prior,
        corrections,
        maxClarificationMarkers: this.gate.maxClarificationMarkers,
        effort: options.effort ?? this.effort,
        today: this.now().toISOString().slice(0, 10)
      });
      log.debug({ feature: feature.key, phase, iteration }, "generating artifact");

      const generated = await this.generate(request, { signal: options.signal });
      if (generated.kind === "cancelled" || options.signal?.aborted) {
        return { status: "cancelled", feature };
      }

      let record: ValidationRecord;
      if (generated.kind === "unavailable") {
        record = this.record(
          {
            phase,
            iteration,
            passed: false,
            violations: [{ ruleId: GENERATION_UNAVAILABLE_RULE, message: generated.error.message }]
          },
          null
        );
        await this.store.appendValidation(feature, record);
      } else {
        const report = validate(phase, generated.content, gateContext(iteration));
        const artifact = await this.store.putArtifact(feature, phase, generated.content, {
          iteration,
          outcome: report.passed ? "passed" : "failed"
        });
        record = this.record(report, artifact.version);
        await this.store.appendValidation(feature, record);
      }

      const passed = record.passed;
      feature = await this.store.updateFeature(feature, (stored) => {
        const status: PhaseStatus = passed ? "PASSED" : stored.phaseStatus[phase];
        return {
          ...stored,
          iterations: { ...stored.iterations, [phase]: iteration },
          phaseStatus: { ...stored.phaseStatus, [phase]: status }
        };
      });
      this.emit("phase.evaluated", feature, phase, iteration, record.violations);
      if (record.passed) {
        this.emit("phase.status", feature, phase, iteration);
        log.info({ feature: feature.key, phase, iteration }, "phase passed");
        return { status: "passed", feature };
      }
      log.warn({ feature: feature.key, phase, iteration, violations: record.violations.length }, "phase failed its gate");
      corrections = { iteration, violations: record.violations };
    }

    feature = await this.transition(feature, phase, "BLOCKED");
    log.error({ feature: feature.key, phase, iterations: this.maxIterations }, "phase blocked");
    return { status: "blocked", feature, history: await this.store.getValidationHistory(feature, phase) };
  }

  private async generate(
    request: GenerationRequest,
    options: GenerateOptions
  ): Promise<{ kind: "content"; content: string } | { kind: "unavailable"; error: TransientCallError } | { kind: "cancelled" }> {
    try {
      return { kind: "content", content: await this.generator.generate(request, options) };
    } catch (error) {
      if (error instanceof CancelledError) {
        return { kind: "cancelled" };
      }
      if (error instanceof TransientCallError) {
        log.warn({ code: error.code, reason: error.message }, "generation unavailable, iteration consumed");
        return { kind: "unavailable", error };
      }
      throw error;
    }
  }

  // The constitution is project-wide. A feature references its own, or takes a
  // copy of the newest one another feature of the workspace passed with.
  private async reuseConstitution(feature: Feature, context: GateContext): Promise<Feature | null> {
    const own = await this.store.findLatest(feature, "constitution");
    const source = own ?? (await this.workspaceConstitution(feature));
    if (!source) {
      return null;
    }
    const report = validate("constitution", source.content, context);
    if (!report.passed) {
      return null;
    }
    const iteration = report.iteration;
    const version = own
      ? own.version
      : (await this.store.putArtifact(feature, "constitution", source.content, { iteration, outcome: "passed" })).version;
    await this.store.appendValidation(feature, this.record(report, version));
    const updated = await this.store.updateFeature(feature, (stored) => ({
      ...stored,
      iterations: { ...stored.iterations, constitution: iteration },
      phaseStatus: { ...stored.phaseStatus, constitution: "PASSED" }
    }));
    this.emit("phase.evaluated", updated, "constitution", iteration, []);
    this.emit("phase.status", updated, "constitution", iteration);
    log.info({ feature: feature.key, from: source.featureKey, version }, "existing constitution reused");
    return updated;
  }

  private async workspaceConstitution(feature: Feature): Promise<Artifact | null> {
    let newest: Artifact | null = null;
    // Features arrive in number order; the last passed constitution wins.
    for await (const other of this.store.listFeatures({ includeArchived: true })) {
      if (other.key === feature.key || other.phaseStatus.constitution !== "PASSED") {
        continue;
      }
      newest = (await this.store.findLatest(other, "constitution")) ?? newest;
    }
    return newest;
  }

  private async priorArtifacts(feature: Feature, phase: Phase): Promise<Partial<Record<Phase, Artifact>>> {
    const prior: Partial<Record<Phase, Artifact>> = {};
    for (const earlier of PHASES.slice(0, PHASES.indexOf(phase))) {
      if (feature.phaseStatus[earlier] !== "PASSED") {
        continue;
      }
      const artifact = await this.store.findLatest(feature, earlier);
      if (artifact) {
        prior[earlier] = artifact;
      }
    }
    return prior;
  }

  // A resumed phase picks up the violations of its last failed attempt.
  private async lastCorrections(
    feature: Feature,
    phase: Phase
  ): Promise<{ iteration: number; violations: Violation[] } | null> {
    if (feature.iterations[phase] === 0) {
      return null;
    }
    const history = await this.store.getValidationHistory(feature, phase);
    const last = history[history.length - 1];
    if (!last || last.passed) {
      return null;
    }
    return { iteration: last.iteration, violations: last.violations };
  }

  private record(report: ValidationReport, artifactVersion: number | null): ValidationRecord {
    return { ...report, artifactVersion, recordedAt: this.now().toISOString() };
  }

  private async transition(
    feature: Feature,
    phase: Phase,
    status: PhaseStatus,
    options: { resetIterations?: boolean } = {}
  ): Promise<Feature> {
    const updated = await this.store.updateFeature(feature, (stored) => ({
      ...stored,
      phaseStatus: { ...stored.phaseStatus, [phase]: status },
      iterations: options.resetIterations ? { ...stored.iterations, [phase]: 0 } : stored.iterations
    }));
    this.emit("phase.status", updated, phase, updated.iterations[phase]);
    log.debug({ feature: updated.key, phase, status }, "phase status changed");
    return updated;
  }

  private emit(type: PhaseEventType, feature: Feature, phase: Phase, iteration: number, violations?: Violation[]): void {
    this.events?.publish({
      type,
      featureNumber: feature.number,
      featureKey: feature.key,
      phase,
      status: feature.phaseStatus[phase],
      iteration,
      ...(violations ? { violations } : {})
    });
  }
}
