import type { Config } from "../config.js";
import { InputValidationError, ModelRequestError, ResponseInterpretationError } from "../errors.js";
import { createOpenAICompleter, getTotalTokens, resetTokenCount, type Completer } from "../openai/client.js";
import { collectIdeaInput, isComplete, withDefaults, type RawIdeaInput } from "../ui/form.js";
import { failStep, startStep, succeedStep } from "../utils/spinner.js";
import { evaluateIdea } from "./evaluate.js";
import { parseIdeaInput } from "./prompt.js";
import { generateReport } from "./report.js";
import { ratingBand } from "./scoring.js";

export type OutputFormat = "markdown" | "json";

export interface EvaluationOptions {
  config: Config;
  input: RawIdeaInput;
  format: OutputFormat;
  /** Prompt for missing fields instead of failing validation. */
  interactive: boolean;
  verbose: boolean;
  /** Defaults to the OpenAI Responses API. */
  complete?: Completer;
}

/**
 * Validate, evaluate and print one idea. Failures are thrown for the caller
 * to report; invalid input is rejected before the model is called.
 */
export async function runEvaluation(options: EvaluationOptions): Promise<void> {
  const { config } = options;
  const complete = options.complete ?? createOpenAICompleter(config);
  resetTokenCount();

  const raw =
    options.interactive && !isComplete(options.input)
      ? await collectIdeaInput(options.input)
      : withDefaults(options.input);
  const input = parseIdeaInput(raw);

  startStep(`Evaluating idea with ${config.openaiModel}...`);
  try {
    const result = await evaluateIdea(input, complete);
    succeedStep(`Overall score: ${result.overallScore.toFixed(1)}/5.0 (${ratingBand(result.overallScore)})`);

    if (options.format === "json") {
      console.log(JSON.stringify({ input, result }, null, 2));
    } else {
      console.log("\n" + generateReport(input, result));
    }

    if (options.verbose) {
      console.error(`\nModel: ${config.openaiModel} | Tokens used: ${getTotalTokens().toLocaleString()}`);
    }
  } catch (error) {
    failStep("Evaluation failed");
    throw error;
  }
}

export function describeFailure(error: unknown): string {
  if (error instanceof InputValidationError) {
    return error.message;
  }
  if (error instanceof ModelRequestError) {
    return `${error.message} Nothing was retried; run the command again to retry.`;
  }
  if (error instanceof ResponseInterpretationError) {
    return `${error.message}\nThe model reply was discarded. Run the command again to request a new evaluation.`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}
