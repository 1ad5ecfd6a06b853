import { z } from "zod";

export const DimensionScoreSchema = z.object({
  score: z.number().int().min(0).max(5),
  reasoning: z.string(),
});

export const ScoresSchema = z.object({
  problemClarity: DimensionScoreSchema,
  userValue: DimensionScoreSchema,
  marketUrgency: DimensionScoreSchema,
  differentiation: DimensionScoreSchema,
  technicalFeasibility: DimensionScoreSchema,
  scalability: DimensionScoreSchema,
  dataDependencies: DimensionScoreSchema,
  riskCompliance: DimensionScoreSchema,
});

export const TechStackEntrySchema = z.object({
  category: z.string(),
  items: z.array(z.string()),
});

export const SlideSchema = z.object({
  title: z.string(),
  content: z.string(),
});

export const ModelEvaluationSchema = z.object({
  executiveSummary: z.string().min(1),
  scores: ScoresSchema,
  implementationPlan: z.array(z.string()).min(1),
  riskFlags: z.array(z.string()),
  techStack: z.array(TechStackEntrySchema).min(1),
  buildChecklist: z.array(z.string()).min(1),
  pitchDeck: z.array(SlideSchema).length(5, "Pitch deck must contain exactly 5 slides"),
});

export type DimensionScore = z.output<typeof DimensionScoreSchema>;
export type Scores = z.output<typeof ScoresSchema>;
export type DimensionKey = keyof Scores;
export type TechStackEntry = z.output<typeof TechStackEntrySchema>;
export type Slide = z.output<typeof SlideSchema>;
export type ModelEvaluation = z.output<typeof ModelEvaluationSchema>;

export interface EvaluationResult extends ModelEvaluation {
  /** Mean of the eight dimension scores. */
  overallScore: number;
}
