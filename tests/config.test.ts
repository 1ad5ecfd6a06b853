import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  it("refuses to start without an API key and names the variable", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow(
      "OPENAI_API_KEY is not set. Copy .env.example to .env and add your key."
    );
  });

  it("treats a blank key as missing", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "   " })).toThrow("OPENAI_API_KEY is not set");
  });

  it("applies defaults", () => {
    expect(loadConfig({ OPENAI_API_KEY: "test-key" })).toEqual({
      openaiApiKey: "test-key",
      openaiModel: "gpt-4o",
      requestTimeoutMs: 60000,
      maxOutputTokens: 2000,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-key",
      OPENAI_MODEL: "gpt-4o-mini",
      REQUEST_TIMEOUT_MS: "15000",
      MAX_OUTPUT_TOKENS: "4000",
    });
    expect(config.openaiModel).toBe("gpt-4o-mini");
    expect(config.requestTimeoutMs).toBe(15000);
    expect(config.maxOutputTokens).toBe(4000);
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-key", REQUEST_TIMEOUT_MS: "soon" })).toThrow(
      'REQUEST_TIMEOUT_MS must be a positive integer, got "soon".'
    );
  });
});
