import { ConfigError } from "./errors.js";

export interface Config {
  openaiApiKey: string;
  openaiModel: string;
  requestTimeoutMs: number;
  maxOutputTokens: number;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Config {
  const openaiApiKey = env.OPENAI_API_KEY?.trim();
  if (!openaiApiKey) {
    throw new ConfigError("OPENAI_API_KEY is not set. Copy .env.example to .env and add your key.");
  }

  return {
    openaiApiKey,
    openaiModel: env.OPENAI_MODEL || "gpt-4o",
    requestTimeoutMs: positiveInt(env, "REQUEST_TIMEOUT_MS", 60_000),
    maxOutputTokens: positiveInt(env, "MAX_OUTPUT_TOKENS", 2000),
  };
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}".`);
  }
  return value;
}
