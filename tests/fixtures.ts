import type { ModelEvaluation } from "../src/openai/schemas/evaluation.zod.js";

export const MEAL_PLANNER_INPUT = {
  idea: "AI meal planner",
  targetUsers: "students",
  goals: "save time",
  teamSize: 3,
  hoursAvailable: 48,
};

export function makeModelEvaluation(): ModelEvaluation {
  return {
    executiveSummary: "A focused, demoable idea with a clear student audience.",
    scores: {
      problemClarity: { score: 3, reasoning: "Problem is common but broad" },
      userValue: { score: 4, reasoning: "Saves students real time" },
      marketUrgency: { score: 2, reasoning: "Many free alternatives" },
      differentiation: { score: 3, reasoning: "Budget-aware planning is a hook" },
      technicalFeasibility: { score: 4, reasoning: "LLM plus recipe API is doable in 48h" },
      scalability: { score: 2, reasoning: "Recipe licensing limits growth" },
      dataDependencies: { score: 1, reasoning: "Needs nutrition and price data" },
      riskCompliance: { score: 3, reasoning: "Dietary advice disclaimers needed" },
    },
    implementationPlan: ["Define user flow", "Build recipe generator", "Polish demo"],
    riskFlags: ["Nutrition data accuracy", "Scope creep"],
    techStack: [
      { category: "Frontend", items: ["React", "Tailwind CSS"] },
      { category: "AI/ML", items: ["OpenAI API"] },
    ],
    buildChecklist: ["Set up repo", "Create meal plan endpoint", "Record demo video"],
    pitchDeck: [
      { title: "Problem", content: "Students waste hours deciding what to eat." },
      { title: "Solution", content: "A planner that builds a week of meals in seconds." },
      { title: "Technical approach", content: "LLM prompts over a recipe catalogue." },
      { title: "Market", content: "Millions of students cook on a budget." },
      { title: "Business model", content: "Freemium with grocery partner referrals." },
    ],
  };
}

export function makeReply(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({ ...makeModelEvaluation(), ...overrides });
}
