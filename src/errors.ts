export function formatError(code: string, message: string): string {
  return `[${code}] ${message}`;
}

export function printError(code: string, message: string): void {
  console.log(formatError(code, message));
}

export class SpecloopError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends SpecloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SPL-1001", message, options);
  }
}

export class InvalidInputError extends SpecloopError {
  constructor(message: string) {
    super("SPL-1002", message);
  }
}

export class DuplicateSlugError extends SpecloopError {
  readonly slug: string;
  readonly existingKey: string;

  constructor(slug: string, existingKey: string) {
    super("SPL-2001", `An active feature already uses slug "${slug}" (${existingKey}). Choose another slug or archive it.`);
    this.slug = slug;
    this.existingKey = existingKey;
  }
}

export class NotFoundError extends SpecloopError {
  constructor(message: string) {
    super("SPL-2002", message);
  }
}

export class StoreError extends SpecloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SPL-2003", message, options);
  }
}

export class LockTimeoutError extends SpecloopError {
  readonly lockPath: string;

  constructor(lockPath: string, waitedMs: number) {
    super("SPL-2004", `Lock ${lockPath} is held by another writer (waited ${waitedMs}ms). Retry shortly.`);
    this.lockPath = lockPath;
  }
}

export type CallErrorDetails = {
  status?: number;
  errorCode?: string;
  attempts?: number;
  cause?: unknown;
};

export class TransientCallError extends SpecloopError {
  readonly status?: number;
  readonly errorCode?: string;
  readonly attempts?: number;

  constructor(message: string, details: CallErrorDetails = {}, code = "SPL-3001") {
    super(code, message, { cause: details.cause });
    this.status = details.status;
    this.errorCode = details.errorCode;
    this.attempts = details.attempts;
  }
}

export class RateLimitError extends TransientCallError {
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, details: CallErrorDetails = {}) {
    super(message, details, "SPL-3002");
    this.retryAfterMs = retryAfterMs;
  }
}

export class TimeoutError extends TransientCallError {
  readonly budgetMs: number;

  constructor(budgetMs: number, details: CallErrorDetails = {}) {
    super(`Generation call exceeded its ${budgetMs}ms budget.`, details, "SPL-3003");
    this.budgetMs = budgetMs;
  }
}

export class PermanentCallError extends SpecloopError {
  readonly status?: number;
  readonly errorCode?: string;

  constructor(message: string, details: CallErrorDetails = {}) {
    super("SPL-3101", message, { cause: details.cause });
    this.status = details.status;
    this.errorCode = details.errorCode;
  }
}

export class CancelledError extends SpecloopError {
  constructor(message = "Generation call was cancelled.") {
    super("SPL-3201", message);
  }
}

export class PhaseOrderError extends SpecloopError {
  constructor(message: string) {
    super("SPL-4001", message);
  }
}

export function describeError(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
