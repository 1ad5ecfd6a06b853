import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { InputValidationError } from "../errors.js";
import type { Prompt } from "../openai/client.js";
import { IdeaInputSchema, type IdeaInput } from "../openai/schemas/idea.zod.js";
import { DIMENSIONS, SCORE_SCALE } from "./scoring.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// src/pipeline (dev, tests) or dist/src/pipeline (compiled); the .md files only live under src/.
const PROMPT_DIRS = [
  path.resolve(__dirname, "..", "openai", "prompts"),
  path.resolve(__dirname, "..", "..", "..", "src", "openai", "prompts"),
];

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

export const COACH_INSTRUCTIONS =
  "You are an expert hackathon mentor reviewing a team's idea before the event starts. " +
  "Give an honest, structured assessment that the team can act on immediately. " +
  "Follow the requested JSON format exactly and output valid JSON only.";

let _template: string | null = null;

function loadPrompt(name: string): string {
  for (const dir of PROMPT_DIRS) {
    const file = path.join(dir, `${name}.md`);
    if (fs.existsSync(file)) {
      return fs.readFileSync(file, "utf-8");
    }
  }
  throw new Error(`Prompt template "${name}.md" not found in ${PROMPT_DIRS.join(", ")}`);
}

/**
 * Validate raw form/CLI values. Text is kept exactly as typed so it can be
 * quoted verbatim in the prompt.
 */
export function parseIdeaInput(raw: unknown): IdeaInput {
  const result = IdeaInputSchema.safeParse(raw);
  if (!result.success) {
    throw new InputValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
    );
  }
  return Object.freeze(result.data);
}

export function buildPrompt(input: IdeaInput): Prompt {
  _template ??= loadPrompt("coach");

  const values: Record<string, string> = {
    idea: input.idea,
    targetUsers: input.targetUsers,
    goals: input.goals,
    teamSize: String(input.teamSize),
    hoursAvailable: String(input.hoursAvailable),
    dimensions: DIMENSIONS.map((d, i) => `${i + 1}. ${d.label} (key "${d.key}"): 5 means ${d.high}`).join("\n"),
    scale: SCORE_SCALE.map((line) => `- ${line}`).join("\n"),
    schema: JSON.stringify(outputShape(), null, 2),
  };

  // Single pass, so user text that happens to contain {{...}} is left alone.
  return {
    instructions: COACH_INSTRUCTIONS,
    input: _template.replace(PLACEHOLDER, (match: string, name: string) => (name in values ? values[name] : match)),
  };
}

function outputShape(): Record<string, unknown> {
  const scores: Record<string, { score: string; reasoning: string }> = {};
  for (const d of DIMENSIONS) {
    scores[d.key] = { score: "integer 0-5", reasoning: `string, why ${d.label} got this score` };
  }

  return {
    executiveSummary: "string, 2-3 sentence overall assessment",
    scores,
    implementationPlan: ["string, one milestone per item, in order"],
    riskFlags: ["string"],
    techStack: [{ category: "string, e.g. Frontend", items: ["string"] }],
    buildChecklist: ["string, one actionable task per item"],
    pitchDeck: [
      { title: "Problem", content: "string" },
      { title: "Solution", content: "string" },
      { title: "Technical approach", content: "string" },
      { title: "Market", content: "string" },
      { title: "Business model", content: "string" },
    ],
  };
}
