import { defaultConfig } from "../config";
import { PermanentCallError, TransientCallError } from "../errors";
import { ArtifactStore, createArtifactStore } from "../store/artifact-store";
import { PASSING, makeTempWorkspace, removeTempWorkspace, withoutSection } from "../test-support/artifacts";
import { FakeGenerator, Reply } from "../test-support/generator";
import { ComplexityTier, Feature, Phase } from "../types";
import { PhaseEvent, PhaseEventBus } from "./events";
import { GENERATION_UNAVAILABLE_RULE, PhaseMachine, canEnterPhase } from "./phase-machine";
import { createPhaseMachine } from "./start";

const NOW = new Date("2026-03-01T10:00:00.000Z");
const FAILING_SPECIFICATION = withoutSection(PASSING.specification, "## Success Criteria");
const WITH_MARKER = `${PASSING.specification}\n- [NEEDS CLARIFICATION: Which roles exist?]`;

describe("PhaseMachine", () => {
  let workspace: string;
  let store: ArtifactStore;
  let events: PhaseEvent[];

  beforeEach(() => {
    workspace = makeTempWorkspace("machine");
    store = createArtifactStore(workspace, { now: () => NOW });
    events = [];
  });

  afterEach(() => {
    removeTempWorkspace(workspace);
  });

  function machineWith(generator: FakeGenerator, maxIterations = 3): PhaseMachine {
    const bus = new PhaseEventBus();
    bus.subscribe((event) => events.push(event));
    return createPhaseMachine(store, generator, { ...defaultConfig(), maxIterations }, { events: bus, now: () => NOW });
  }

  function feature(tier: ComplexityTier = "simple"): Promise<Feature> {
    return store.createFeature({ slug: "todo-app", tier, request: "build a small todo app" });
  }

  function statusTrail(): string[] {
    return events.filter((event) => event.type === "phase.status").map((event) => `${event.phase}:${event.status}`);
  }

  it("runs every phase in order and skips clarification without open questions", async () => {
    const generator = new FakeGenerator();
    const outcome = await machineWith(generator).run(await feature());

    expect(outcome.status).toBe("completed");
    expect(outcome.feature.phaseStatus).toEqual({
      constitution: "PASSED",
      specification: "PASSED",
      clarification: "SKIPPED",
      plan: "PASSED",
      tasks: "PASSED",
      implementation: "PASSED"
    });
    expect(generator.phases()).toEqual(["constitution", "specification", "plan", "tasks", "implementation"]);
    expect(statusTrail()).toEqual([
      "constitution:IN_PROGRESS",
      "constitution:PASSED",
      "specification:IN_PROGRESS",
      "specification:PASSED",
      "clarification:SKIPPED",
      "plan:IN_PROGRESS",
      "plan:PASSED",
      "tasks:IN_PROGRESS",
      "tasks:PASSED",
      "implementation:IN_PROGRESS",
      "implementation:PASSED"
    ]);
  });

  it("hands earlier passed artifacts to later phases", async () => {
    const generator = new FakeGenerator();
    await machineWith(generator).run(await feature());

    const plan = generator.calls.find((call) => call.phase === "plan");
    expect(plan?.request.context).toContain("### constitution (version 1)");
    expect(plan?.request.context).toContain("### specification (version 1)");
    expect(plan?.request.context).not.toContain("### clarification");
    expect(plan?.request.effort).toBe("medium");
    expect(plan?.request.prompt).toContain("Request: build a small todo app");
  });

  it("regenerates with the violations until the gate passes", async () => {
    const generator = new FakeGenerator({ specification: [FAILING_SPECIFICATION, FAILING_SPECIFICATION] });
    const created = await feature();
    const outcome = await machineWith(generator).run(created, { effort: "high" });

    expect(outcome.status).toBe("completed");
    expect(outcome.feature.iterations.specification).toBe(3);
    const history = await store.getValidationHistory(created, "specification");
    expect(history.map((record) => [record.iteration, record.passed, record.artifactVersion])).toEqual([
      [1, false, 1],
      [2, false, 2],
      [3, true, 3]
    ]);
    expect(history[0].violations).toEqual([
      { ruleId: "specification.success-criteria", message: "Missing required section: Success Criteria" }
    ]);
    await expect(store.getLatest(created, "specification")).resolves.toMatchObject({
      version: 3,
      metadata: { iteration: 3, outcome: "passed" }
    });

    const prompts = generator.promptsFor("specification");
    expect(prompts[0]).not.toContain("did not pass the quality checks");
    expect(prompts[1]).toContain("The previous attempt (iteration 1) did not pass the quality checks.");
    expect(prompts[2]).toContain("The previous attempt (iteration 2) did not pass the quality checks.");
    expect(prompts[2]).toContain("- specification.success-criteria: Missing required section: Success Criteria");
    expect(generator.calls[0].request.effort).toBe("high");
  });

  it("blocks a phase after the iteration budget and stops there", async () => {
    const failing: Reply[] = [FAILING_SPECIFICATION, FAILING_SPECIFICATION, FAILING_SPECIFICATION];
    const generator = new FakeGenerator({ specification: failing });
    const created = await feature();
    const machine = machineWith(generator);

    const outcome = await machine.run(created);

    expect(outcome.status).toBe("blocked");
    expect(outcome.blockedPhase).toBe("specification");
    expect(outcome.history).toHaveLength(3);
    expect(outcome.feature.phaseStatus.specification).toBe("BLOCKED");
    expect(outcome.feature.phaseStatus.plan).toBe("PENDING");
    expect(generator.phases()).toEqual(["constitution", "specification", "specification", "specification"]);

    const again = await machine.run(created);
    expect(again.status).toBe("blocked");
    expect(again.history).toHaveLength(3);
    expect(generator.calls).toHaveLength(4);
  });

  it("continues after a restart of the blocked phase", async () => {
    const generator = new FakeGenerator({
      specification: [FAILING_SPECIFICATION, FAILING_SPECIFICATION]
    });
    const created = await feature();
    const machine = machineWith(generator, 2);
    await machine.run(created);

    const outcome = await machine.restart(created, "specification");
    expect(outcome.status).toBe("completed");
    expect(outcome.feature.iterations.specification).toBe(1);
    await expect(store.getHistory(created, "specification")).resolves.toHaveLength(3);
    await expect(store.getValidationHistory(created, "specification")).resolves.toHaveLength(3);
  });

  it("resets phases without running them", async () => {
    const generator = new FakeGenerator({ specification: [FAILING_SPECIFICATION] });
    const created = await feature();
    const machine = machineWith(generator, 1);
    await machine.run(created);

    const reset = await machine.reset(created, "specification");
    expect(reset.phaseStatus.specification).toBe("PENDING");
    expect(reset.iterations.specification).toBe(0);
    expect(generator.calls).toHaveLength(2);
  });

  it("runs clarification when the specification has open questions", async () => {
    const generator = new FakeGenerator({ specification: [WITH_MARKER] });
    const outcome = await machineWith(generator).run(await feature());

    expect(outcome.feature.phaseStatus.clarification).toBe("PASSED");
    expect(generator.phases()).toEqual(["constitution", "specification", "clarification", "plan", "tasks", "implementation"]);
    const plan = generator.calls.find((call) => call.phase === "plan");
    expect(plan?.request.context).toContain("### clarification (version 1)");
  });

  it("always clarifies complex requests unless told to skip", async () => {
    const complex = await machineWith(new FakeGenerator()).run(await feature("complex"));
    expect(complex.feature.phaseStatus.clarification).toBe("PASSED");

    const other = await store.createFeature({ slug: "other", tier: "complex" });
    const skipped = await machineWith(new FakeGenerator()).run(other, { skipClarification: true });
    expect(skipped.feature.phaseStatus.clarification).toBe("SKIPPED");
  });

  it("clarifies a simple request on demand", async () => {
    const generator = new FakeGenerator();
    const outcome = await machineWith(generator).run(await feature(), { forceClarification: true });
    expect(outcome.feature.phaseStatus.clarification).toBe("PASSED");
  });

  it("records an unavailable generation service as a consumed iteration", async () => {
    const unavailable = new TransientCallError("Generation call failed after 4 attempt(s): Service returned 503.", {
      status: 503
    });
    const generator = new FakeGenerator({ specification: [unavailable] });
    const created = await feature();
    const outcome = await machineWith(generator).run(created);

    expect(outcome.status).toBe("completed");
    expect(outcome.feature.iterations.specification).toBe(2);
    const history = await store.getValidationHistory(created, "specification");
    expect(history[0]).toEqual({
      phase: "specification",
      iteration: 1,
      passed: false,
      violations: [{ ruleId: GENERATION_UNAVAILABLE_RULE, message: unavailable.message }],
      artifactVersion: null,
      recordedAt: "2026-03-01T10:00:00.000Z"
    });
    expect(history[1].artifactVersion).toBe(1);
  });

  it("propagates permanent generation failures", async () => {
    const generator = new FakeGenerator({ specification: [new PermanentCallError("Generation service rejected the request (400).")] });
    const created = await feature();

    await expect(machineWith(generator).run(created)).rejects.toBeInstanceOf(PermanentCallError);
    const stored = await store.getFeature(created);
    expect(stored.phaseStatus.specification).toBe("IN_PROGRESS");
    expect(stored.iterations.specification).toBe(0);
  });

  it("persists nothing for a cancelled call and resumes later", async () => {
    const controller = new AbortController();
    const generator = new FakeGenerator({
      specification: [
        () => {
          controller.abort();
          return PASSING.specification;
        }
      ]
    });
    const created = await feature();
    const machine = machineWith(generator);

    const cancelled = await machine.run(created, { signal: controller.signal });
    expect(cancelled.status).toBe("cancelled");
    expect(cancelled.feature.phaseStatus.specification).toBe("IN_PROGRESS");
    await expect(store.getHistory(created, "specification")).resolves.toEqual([]);
    await expect(store.getValidationHistory(created, "specification")).resolves.toEqual([]);

    const resumed = await machine.run(created);
    expect(resumed.status).toBe("completed");
    await expect(store.getLatest(created, "specification")).resolves.toMatchObject({ version: 1 });
  });

  it("restarts from a later phase and keeps earlier work", async () => {
    const generator = new FakeGenerator();
    const created = await feature();
    const machine = machineWith(generator);
    await machine.run(created);
    events = [];

    const outcome = await machine.restart(created, "plan");
    expect(statusTrail().slice(0, 5)).toEqual([
      "plan:PENDING",
      "tasks:PENDING",
      "implementation:PENDING",
      "plan:IN_PROGRESS",
      "plan:PASSED"
    ]);
    expect(outcome.status).toBe("completed");
    expect(generator.phases().slice(5)).toEqual(["plan", "tasks", "implementation"]);
    await expect(store.getLatest(created, "plan")).resolves.toMatchObject({ version: 2 });
    await expect(store.getLatest(created, "specification")).resolves.toMatchObject({ version: 1 });
  });

  it("stops a restarted run when cancelled", async () => {
    const generator = new FakeGenerator();
    const created = await feature();
    const machine = machineWith(generator);
    await machine.run(created);
    const controller = new AbortController();
    controller.abort();

    const outcome = await machine.restart(created, "tasks", { signal: controller.signal });
    expect(outcome.status).toBe("cancelled");
    expect(outcome.feature.phaseStatus.tasks).toBe("IN_PROGRESS");
    expect(generator.calls).toHaveLength(5);
  });

  it("reuses a constitution that still passes", async () => {
    const generator = new FakeGenerator();
    const created = await feature();
    const machine = machineWith(generator);
    await machine.run(created);

    await machine.restart(created);

    expect(generator.phases().filter((phase) => phase === "constitution")).toHaveLength(1);
    await expect(store.getHistory(created, "constitution")).resolves.toHaveLength(1);
    const history = await store.getValidationHistory(created, "constitution");
    expect(history.map((record) => [record.iteration, record.passed, record.artifactVersion])).toEqual([
      [1, true, 1],
      [1, true, 1]
    ]);
  });

  it("shares the workspace constitution with later features", async () => {
    const generator = new FakeGenerator();
    const machine = machineWith(generator);
    const first = await feature();
    await machine.run(first);
    await store.archiveFeature(first);

    const second = await store.createFeature({ slug: "billing", tier: "simple", request: "build billing" });
    const outcome = await machine.run(second);

    expect(outcome.status).toBe("completed");
    expect(generator.phases().filter((phase) => phase === "constitution")).toHaveLength(1);
    await expect(store.getLatest(second, "constitution")).resolves.toMatchObject({
      featureKey: "feature-002-billing",
      version: 1,
      content: PASSING.constitution,
      metadata: { iteration: 1, outcome: "passed" }
    });
    const history = await store.getValidationHistory(second, "constitution");
    expect(history.map((record) => [record.iteration, record.passed, record.artifactVersion])).toEqual([[1, true, 1]]);
  });

  it("generates a constitution when no other feature passed one", async () => {
    const generator = new FakeGenerator({ constitution: ["# Constitution"] });
    const machine = machineWith(generator, 1);
    await machine.run(await feature());

    const second = await store.createFeature({ slug: "billing", tier: "simple" });
    await machine.run(second);

    expect(generator.phases()).toEqual(["constitution", "constitution", "specification", "plan", "tasks", "implementation"]);
  });

  it("marks clarification skipped on request", async () => {
    const created = await feature();
    const skipped = await machineWith(new FakeGenerator()).skipClarification(created);
    expect(skipped.phaseStatus.clarification).toBe("SKIPPED");
    expect(statusTrail()).toEqual(["clarification:SKIPPED"]);
  });
});

describe("canEnterPhase", () => {
  const base: Feature = {
    number: 1,
    slug: "todo-app",
    key: "feature-001-todo-app",
    tier: "simple",
    request: "",
    phaseStatus: {
      constitution: "PASSED",
      specification: "PASSED",
      clarification: "SKIPPED",
      plan: "PENDING",
      tasks: "PENDING",
      implementation: "PENDING"
    },
    iterations: { constitution: 1, specification: 1, clarification: 0, plan: 0, tasks: 0, implementation: 0 },
    archived: false,
    createdAt: "2026-03-01T10:00:00.000Z",
    updatedAt: "2026-03-01T10:00:00.000Z"
  };

  it("allows a phase once every earlier phase passed or was skipped", () => {
    expect(canEnterPhase(base, "plan")).toEqual({ ok: true });
  });

  it.each<[Phase, string]>([
    ["tasks", "Cannot enter tasks; prerequisite phase plan is PENDING."],
    ["implementation", "Cannot enter implementation; prerequisite phase plan is PENDING."]
  ])("refuses %s before its prerequisites", (phase, reason) => {
    expect(canEnterPhase(base, phase)).toEqual({ ok: false, reason });
  });
});
