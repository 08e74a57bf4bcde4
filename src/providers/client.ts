import {
  CancelledError,
  PermanentCallError,
  RateLimitError,
  SpecloopError,
  TimeoutError,
  TransientCallError,
  describeError
} from "../errors";
import { createModuleLogger } from "../utils/logger";
import { Sleep, sleep as defaultSleep } from "../utils/sleep";
import { GenerateOptions, GenerationRequest, GenerationService, Generator } from "./types";

const log = createModuleLogger("client");

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  pollIntervalMs: number;
};

export type ClientOptions = RetryPolicy & {
  sleep?: Sleep;
  now?: () => number;
  random?: () => number;
};

type TaskState = { taskId: string | null };

const TRANSIENT_JOB_CODES = new Set(["rate_limited", "overloaded", "unavailable", "timeout", "internal_error"]);

export function classifyJobFailure(errorCode: string | undefined): SpecloopError {
  const code = errorCode?.trim().toLowerCase() || "unknown";
  if (code === "rate_limited") {
    return new RateLimitError("Generation job was throttled.", undefined, { errorCode: code });
  }
  if (TRANSIENT_JOB_CODES.has(code)) {
    return new TransientCallError(`Generation job failed (${code}).`, { errorCode: code });
  }
  return new PermanentCallError(`Generation job failed (${code}).`, { errorCode: code });
}

export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number): number {
  const jitter = 0.75 + 0.5 * random();
  return Math.round(Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1) * jitter));
}

export class ResilientClient implements Generator {
  private readonly service: GenerationService;
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(service: GenerationService, options: ClientOptions) {
    this.service = service;
    this.policy = {
      maxAttempts: Math.max(1, options.maxAttempts),
      baseDelayMs: options.baseDelayMs,
      maxDelayMs: options.maxDelayMs,
      timeoutMs: options.timeoutMs,
      pollIntervalMs: options.pollIntervalMs
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<string> {
    const external = options.signal;
    if (external?.aborted) {
      throw new CancelledError();
    }
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    external?.addEventListener("abort", onAbort, { once: true });
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.policy.timeoutMs);
    timer.unref();

    try {
      return await this.run(request, controller.signal, this.now() + this.policy.timeoutMs, () => {
        if (external?.aborted) {
          return new CancelledError();
        }
        return timedOut ? new TimeoutError(this.policy.timeoutMs) : null;
      });
    } finally {
      clearTimeout(timer);
      external?.removeEventListener("abort", onAbort);
    }
  }

  private async run(
    request: GenerationRequest,
    signal: AbortSignal,
    deadline: number,
    interrupted: () => SpecloopError | null
  ): Promise<string> {
    let lastError: TransientCallError | null = null;
    const task: TaskState = { taskId: null };
    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt += 1) {
      try {
        return await this.attempt(request, task, signal, deadline);
      } catch (error) {
        const interruption = interrupted();
        if (interruption) {
          throw interruption;
        }
        if (error instanceof TimeoutError || error instanceof PermanentCallError || error instanceof CancelledError) {
          throw error;
        }
        const transient =
          error instanceof TransientCallError
            ? error
            : new TransientCallError(`Generation call failed: ${describeError(error)}`, { cause: error });
        lastError = transient;
        if (attempt === this.policy.maxAttempts) {
          break;
        }
        const wait =
          transient instanceof RateLimitError && transient.retryAfterMs !== undefined
            ? transient.retryAfterMs
            : backoffDelay(attempt, this.policy, this.random);
        if (this.now() + wait >= deadline) {
          throw new TimeoutError(this.policy.timeoutMs, { attempts: attempt, cause: transient });
        }
        log.warn({ attempt, waitMs: wait, code: transient.code, reason: transient.message }, "retrying generation call");
        await this.pause(wait, signal, interrupted);
      }
    }
    const cause = lastError ?? new TransientCallError("Generation call failed.");
    throw new TransientCallError(
      `Generation call failed after ${this.policy.maxAttempts} attempt(s): ${cause.message}`,
      { status: cause.status, errorCode: cause.errorCode, attempts: this.policy.maxAttempts, cause }
    );
  }

  // A failed status request keeps the task; only a failed job or submit leads to a new submit.
  private async attempt(request: GenerationRequest, task: TaskState, signal: AbortSignal, deadline: number): Promise<string> {
    if (task.taskId === null) {
      task.taskId = await this.service.submit(request, signal);
      log.debug({ service: this.service.id, taskId: task.taskId }, "generation task submitted");
    }
    const taskId = task.taskId;
    while (true) {
      const job = await this.service.poll(taskId, signal);
      if (job.status === "done") {
        return job.resultText;
      }
      if (job.status === "failed") {
        task.taskId = null;
        throw classifyJobFailure(job.errorCode);
      }
      if (this.now() + this.policy.pollIntervalMs >= deadline) {
        throw new TimeoutError(this.policy.timeoutMs);
      }
      await this.sleep(this.policy.pollIntervalMs, signal);
    }
  }

  private async pause(ms: number, signal: AbortSignal, interrupted: () => SpecloopError | null): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      throw interrupted() ?? error;
    }
  }
}
