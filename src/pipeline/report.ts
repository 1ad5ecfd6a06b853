import type { IdeaInput } from "../openai/schemas/idea.zod.js";
import type { EvaluationResult } from "../openai/schemas/evaluation.zod.js";
import { DIMENSIONS, ratingBand } from "./scoring.js";

// One tip per deck position: Problem, Solution, Technical approach, Market, Business model.
export const SLIDE_TIPS: readonly string[] = [
  "Start with a relatable scenario or a striking statistic to grab attention.",
  "Demo the key features live if you can, and show the before and after.",
  "Show an architecture diagram and call out the technical challenges you overcame.",
  "Use a chart for market size and mention any customer validation you have.",
  "Show revenue projections and explain your competitive advantage clearly.",
];

export const FINAL_PITCH_TIPS =
  "Keep each slide under 3 minutes, practise the transitions, end with a specific ask " +
  "(funding, partnerships, users) and prepare for Q&A.";

export function generateReport(input: IdeaInput, result: EvaluationResult): string {
  const lines: string[] = [];

  // Header
  lines.push(`# Hackathon Idea Review`);
  lines.push("");
  lines.push(`**Idea:** ${input.idea}`);
  lines.push(`**Target users:** ${input.targetUsers}`);
  lines.push(`**Goals:** ${input.goals}`);
  lines.push(`**Team size:** ${input.teamSize} | **Time available:** ${input.hoursAvailable} hours`);
  lines.push("");

  lines.push("## Executive Summary");
  lines.push("");
  lines.push(result.executiveSummary);
  lines.push("");
  lines.push(`**Overall Score: ${result.overallScore.toFixed(1)}/5.0** (${ratingBand(result.overallScore)})`);
  lines.push("");

  // Score table
  lines.push("## Scores");
  lines.push("");
  lines.push("| Dimension | Score |");
  lines.push("|---|---|");
  for (const d of DIMENSIONS) {
    lines.push(`| ${d.label} | ${result.scores[d.key].score}/5 |`);
  }
  lines.push("");

  lines.push("### Reasoning");
  lines.push("");
  for (const d of DIMENSIONS) {
    lines.push(`- **${d.label}:** ${result.scores[d.key].reasoning}`);
  }
  lines.push("");

  lines.push("## Implementation Plan");
  lines.push("");
  for (let i = 0; i < result.implementationPlan.length; i++) {
    lines.push(`${i + 1}. ${result.implementationPlan[i]}`);
  }
  lines.push("");

  if (result.riskFlags.length > 0) {
    lines.push("## Risk Flags");
    lines.push("");
    for (const risk of result.riskFlags) {
      lines.push(`- ${risk}`);
    }
    lines.push("");
  }

  lines.push("## Recommended Tech Stack");
  lines.push("");
  for (const entry of result.techStack) {
    if (entry.items.length === 0) continue;
    lines.push(`- **${entry.category}:** ${entry.items.join(", ")}`);
  }
  lines.push("");

  lines.push(`## ${input.hoursAvailable}-Hour Build Checklist`);
  lines.push("");
  for (const task of result.buildChecklist) {
    lines.push(`- [ ] ${task}`);
  }
  lines.push("");

  lines.push("## 5-Slide Pitch Deck");
  lines.push("");
  result.pitchDeck.forEach((slide, i) => {
    lines.push(`### Slide ${i + 1}: ${slide.title}`);
    lines.push("");
    lines.push(slide.content);
    lines.push("");
    lines.push(`> **Presentation tip:** ${SLIDE_TIPS[i]}`);
    lines.push("");
  });
  lines.push(`**Final pro tips:** ${FINAL_PITCH_TIPS}`);
  lines.push("");

  return lines.join("\n");
}
