import type { ZodError } from "zod";
import { ResponseInterpretationError } from "../errors.js";
import { ModelEvaluationSchema, type EvaluationResult } from "../openai/schemas/evaluation.zod.js";
import { extractJsonCandidates } from "../utils/json-parse.js";
import { computeOverallScore } from "./scoring.js";

/**
 * Turn the model's raw text into an EvaluationResult. The reply is
 * untrusted: surrounding prose is tolerated, a missing or out-of-range
 * field is not.
 *
 * The first embedded object that satisfies the schema wins. When none does,
 * the issues reported are those of the largest object, which is the one
 * most likely meant as the payload.
 */
export function interpretReply(raw: string): EvaluationResult {
  const candidates = extractJsonCandidates(raw);
  if (candidates.length === 0) {
    throw new ResponseInterpretationError([`No JSON object found in response: ${raw.slice(0, 200)}`]);
  }

  let largest: { size: number; error: ZodError } | null = null;
  for (const candidate of candidates) {
    const parsed = ModelEvaluationSchema.safeParse(candidate.value);
    if (parsed.success) {
      return {
        ...parsed.data,
        overallScore: computeOverallScore(parsed.data.scores),
      };
    }
    if (!largest || candidate.size > largest.size) {
      largest = { size: candidate.size, error: parsed.error };
    }
  }

  throw new ResponseInterpretationError(
    (largest?.error.issues ?? []).map((issue) => `${issue.path.join(".") || "reply"}: ${issue.message}`)
  );
}
