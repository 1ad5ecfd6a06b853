import type { Completer } from "../openai/client.js";
import type { IdeaInput } from "../openai/schemas/idea.zod.js";
import type { EvaluationResult } from "../openai/schemas/evaluation.zod.js";
import { buildPrompt } from "./prompt.js";
import { interpretReply } from "./interpret.js";

export async function evaluateIdea(input: IdeaInput, complete: Completer): Promise<EvaluationResult> {
  const reply = await complete(buildPrompt(input));
  return interpretReply(reply);
}
