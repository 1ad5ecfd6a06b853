import type { DimensionKey, Scores } from "../openai/schemas/evaluation.zod.js";

export interface Dimension {
  key: DimensionKey;
  label: string;
  /** What a 5 looks like on this dimension. */
  high: string;
}

export const DIMENSIONS: readonly Dimension[] = [
  { key: "problemClarity", label: "Problem clarity", high: "a sharply defined, specific problem" },
  { key: "userValue", label: "User value", high: "users would clearly change behaviour to get this" },
  { key: "marketUrgency", label: "Market size & urgency", high: "a large audience that needs this now" },
  { key: "differentiation", label: "Differentiation/moat", high: "clearly distinct from existing alternatives" },
  {
    key: "technicalFeasibility",
    label: "Technical feasibility",
    high: "a convincing demo is realistic for this team in the time available",
  },
  { key: "scalability", label: "Scalability path", high: "an obvious path from prototype to product" },
  {
    key: "dataDependencies",
    label: "Data dependencies",
    high: "no hard-to-get data, APIs or partnerships are needed",
  },
  { key: "riskCompliance", label: "Risks & compliance", high: "negligible legal, privacy or safety exposure" },
];

export const SCORE_SCALE: readonly string[] = [
  "0 = not addressed or impossible to judge",
  "1 = very weak",
  "2 = weak",
  "3 = adequate",
  "4 = strong",
  "5 = exceptional",
];

export type RatingBand = "high" | "medium" | "low";

export function computeOverallScore(scores: Scores): number {
  const values = DIMENSIONS.map((d) => scores[d.key].score);
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function ratingBand(overall: number): RatingBand {
  if (overall >= 3.5) return "high";
  if (overall >= 2.5) return "medium";
  return "low";
}
