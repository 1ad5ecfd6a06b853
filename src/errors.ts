import { APIConnectionTimeoutError } from "openai";

export class CoachError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends CoachError {}

/** User input that fails validation. Raised before any model call. */
export class InputValidationError extends CoachError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid idea input:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.issues = issues;
  }
}

export type ModelRequestFailure = "timeout" | "network" | "http" | "unknown";

export class ModelRequestError extends CoachError {
  readonly kind: ModelRequestFailure;
  readonly status?: number;
  // Every request failure may be retried by the user; nothing retries on its own.
  readonly retryable = true;

  constructor(message: string, kind: ModelRequestFailure, options: ErrorOptions & { status?: number } = {}) {
    super(message, { cause: options.cause });
    this.kind = kind;
    this.status = options.status;
  }
}

export class ResponseInterpretationError extends CoachError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Could not interpret the model response:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.issues = issues;
  }
}

export function toModelRequestError(error: unknown, timeoutMs: number): ModelRequestError {
  if (error instanceof ModelRequestError) return error;

  if (error instanceof APIConnectionTimeoutError) {
    return new ModelRequestError(`Model request timed out after ${timeoutMs}ms.`, "timeout", { cause: error });
  }

  const status = getErrorStatus(error);
  if (status !== undefined) {
    return new ModelRequestError(`Model API returned HTTP ${status}: ${errorMessage(error)}`, "http", {
      cause: error,
      status,
    });
  }

  if (isNetworkLikeError(error)) {
    return new ModelRequestError(`Could not reach the model API: ${errorMessage(error)}`, "network", { cause: error });
  }

  return new ModelRequestError(`Model request failed: ${errorMessage(error)}`, "unknown", { cause: error });
}

function getErrorStatus(error: unknown): number | undefined {
  if (error && typeof error === "object" && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function isNetworkLikeError(error: unknown): boolean {
  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    return (
      msg.includes("timeout") ||
      msg.includes("econnreset") ||
      msg.includes("econnrefused") ||
      msg.includes("enotfound") ||
      msg.includes("fetch failed") ||
      msg.includes("connection error")
    );
  }
  return false;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
