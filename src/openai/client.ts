import OpenAI from "openai";
import type { Config } from "../config.js";
import { toModelRequestError } from "../errors.js";

let _client: OpenAI | null = null;
let _totalTokens = 0;

function getClient(config: Config): OpenAI {
  if (_client) return _client;
  // No automatic retries: a failed call is reported and the user decides whether to try again.
  _client = new OpenAI({
    apiKey: config.openaiApiKey,
    timeout: config.requestTimeoutMs,
    maxRetries: 0,
  });
  return _client;
}

export function getTotalTokens(): number {
  return _totalTokens;
}

export function resetTokenCount(): void {
  _totalTokens = 0;
}

export interface Prompt {
  /** Role and output rules, sent as the system instructions. */
  instructions: string;
  /** The idea and the requested evaluation. */
  input: string;
}

/** Sends one prompt and resolves with the model's raw text reply. */
export type Completer = (prompt: Prompt) => Promise<string>;

/**
 * Completer backed by a single call to the OpenAI Responses API.
 * Every failure surfaces as a ModelRequestError.
 */
export function createOpenAICompleter(config: Config): Completer {
  return async function callOpenAI(prompt: Prompt): Promise<string> {
    const client = getClient(config);

    try {
      const response = await client.responses.create({
        model: config.openaiModel,
        instructions: prompt.instructions,
        input: prompt.input,
        temperature: 0.7,
        max_output_tokens: config.maxOutputTokens,
      });

      if (response.usage) {
        _totalTokens += response.usage.input_tokens + response.usage.output_tokens;
      }

      return response.output_text;
    } catch (error) {
      throw toModelRequestError(error, config.requestTimeoutMs);
    }
  };
}
