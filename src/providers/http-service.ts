import { PermanentCallError, RateLimitError, TransientCallError, describeError } from "../errors";
import { validateJson } from "../validation/validate";
import { GenerationRequest, GenerationService, JobStatus } from "./types";

type SubmitResponse = {
  task_id: string;
};

type StatusResponse = {
  status: "pending" | "done" | "failed";
  result_text?: string;
  error_code?: string;
};

export type HttpServiceOptions = {
  endpoint: string;
  apiKey?: string;
  fetch?: typeof fetch;
  now?: () => number;
};

export function parseRetryAfter(value: string | null, now: number): number | undefined {
  const raw = value?.trim();
  if (!raw) {
    return undefined;
  }
  if (/^\d+(\.\d+)?$/.test(raw)) {
    return Math.round(Number(raw) * 1000);
  }
  const at = Date.parse(raw);
  if (Number.isNaN(at)) {
    return undefined;
  }
  return Math.max(0, at - now);
}

function assertResponse<T>(schemaFile: string, value: unknown, url: string): asserts value is T {
  const validation = validateJson(schemaFile, value);
  if (!validation.valid) {
    throw new PermanentCallError(`Malformed response from ${url}: ${validation.errors.join("; ")}`);
  }
}

export class HttpGenerationService implements GenerationService {
  readonly id = "http";
  private readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: HttpServiceOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  async submit(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    const url = `${this.endpoint}/tasks`;
    const response = await this.send(url, {
      method: "POST",
      body: JSON.stringify({
        prompt_text: request.prompt,
        prior_context: request.context,
        effort_level: request.effort
      }),
      signal
    });
    const body = await this.readJson(response, url);
    assertResponse<SubmitResponse>("generation-submit.schema.json", body, url);
    return body.task_id;
  }

  async poll(taskId: string, signal: AbortSignal): Promise<JobStatus> {
    const url = `${this.endpoint}/tasks/${encodeURIComponent(taskId)}`;
    const response = await this.send(url, { method: "GET", signal });
    const body = await this.readJson(response, url);
    assertResponse<StatusResponse>("generation-status.schema.json", body, url);
    if (body.status === "done") {
      if (body.result_text === undefined) {
        throw new PermanentCallError(`Malformed response from ${url}: done without result_text`);
      }
      return { status: "done", resultText: body.result_text };
    }
    if (body.status === "failed") {
      return { status: "failed", errorCode: body.error_code };
    }
    return { status: "pending" };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
      "User-Agent": "specloop"
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  private async send(url: string, init: { method: string; body?: string; signal: AbortSignal }): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { ...init, headers: this.headers() });
    } catch (error) {
      if (init.signal.aborted) {
        throw error;
      }
      throw new TransientCallError(`Network error calling ${url}: ${describeError(error)}`, { cause: error });
    }
    if (response.ok) {
      return response;
    }
    const status = response.status;
    if (status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"), this.now());
      throw new RateLimitError(`Generation service throttled the request (${url}).`, retryAfterMs, { status });
    }
    if (status === 408 || status >= 500) {
      throw new TransientCallError(`Generation service returned ${status} for ${url}.`, { status });
    }
    if (status === 401 || status === 403) {
      throw new PermanentCallError(`Generation service rejected the credentials (${status}). Check the API key.`, {
        status
      });
    }
    throw new PermanentCallError(`Generation service rejected the request (${status}) for ${url}.`, { status });
  }

  private async readJson(response: Response, url: string): Promise<unknown> {
    const text = await response.text();
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new PermanentCallError(`Malformed response from ${url}: ${describeError(error)}`, { cause: error });
    }
  }
}
