import { describe, it, expect } from "vitest";
import { APIConnectionTimeoutError } from "openai";
import { ModelRequestError, toModelRequestError } from "../src/errors.js";
import { describeFailure } from "../src/pipeline/run.js";

describe("toModelRequestError", () => {
  it("classifies a client timeout", () => {
    const error = toModelRequestError(new APIConnectionTimeoutError(), 60000);
    expect(error.kind).toBe("timeout");
    expect(error.message).toBe("Model request timed out after 60000ms.");
    expect(error.retryable).toBe(true);
  });

  it("keeps the HTTP status of an API error", () => {
    const apiError = Object.assign(new Error("Rate limit reached"), { status: 429 });
    const error = toModelRequestError(apiError, 60000);
    expect(error.kind).toBe("http");
    expect(error.status).toBe(429);
    expect(error.message).toBe("Model API returned HTTP 429: Rate limit reached");
    expect(error.cause).toBe(apiError);
  });

  it("classifies connection failures as network errors", () => {
    const error = toModelRequestError(new Error("fetch failed"), 60000);
    expect(error.kind).toBe("network");
    expect(error.message).toBe("Could not reach the model API: fetch failed");
  });

  it("wraps anything else", () => {
    const error = toModelRequestError("boom", 60000);
    expect(error.kind).toBe("unknown");
    expect(error.message).toBe("Model request failed: boom");
  });

  it("passes an existing ModelRequestError through", () => {
    const original = new ModelRequestError("already wrapped", "network");
    expect(toModelRequestError(original, 1000)).toBe(original);
  });
});

describe("describeFailure", () => {
  it("tells the user a request failure can be retried", () => {
    const error = new ModelRequestError("Model request timed out after 60000ms.", "timeout");
    expect(describeFailure(error)).toBe(
      "Model request timed out after 60000ms. Nothing was retried; run the command again to retry."
    );
  });

  it("prefixes other errors", () => {
    expect(describeFailure(new Error("disk full"))).toBe("Error: disk full");
  });
});
