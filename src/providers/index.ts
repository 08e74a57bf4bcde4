import { ClientConfig } from "../config";
import { ResilientClient, ClientOptions } from "./client";
import { HttpGenerationService } from "./http-service";
import { GenerationService } from "./types";

export type ClientOverrides = Pick<ClientOptions, "sleep" | "now" | "random"> & {
  service?: GenerationService;
  fetch?: typeof fetch;
};

export function createGenerationClient(config: ClientConfig, apiKey?: string, overrides: ClientOverrides = {}): ResilientClient {
  const service =
    overrides.service ??
    new HttpGenerationService({
      endpoint: config.endpoint,
      apiKey,
      fetch: overrides.fetch
    });
  return new ResilientClient(service, {
    maxAttempts: config.maxAttempts,
    baseDelayMs: config.baseDelayMs,
    maxDelayMs: config.maxDelayMs,
    timeoutMs: config.timeoutMs,
    pollIntervalMs: config.pollIntervalMs,
    sleep: overrides.sleep,
    now: overrides.now,
    random: overrides.random
  });
}

export { ResilientClient, backoffDelay, classifyJobFailure } from "./client";
export { HttpGenerationService, parseRetryAfter } from "./http-service";
export type { GenerationRequest, GenerationService, Generator, JobStatus } from "./types";
