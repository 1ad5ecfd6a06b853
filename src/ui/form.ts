import { cancel, intro, isCancel, select, text } from "@clack/prompts";

/** Form/CLI values before validation. */
export interface RawIdeaInput {
  idea?: string;
  targetUsers?: string;
  goals?: string;
  teamSize?: number;
  hoursAvailable?: number;
}

export const DEFAULT_TEAM_SIZE = 3;
export const DEFAULT_HOURS = 48;

const HOUR_OPTIONS = [24, 36, 48, 60, 72];
const TEAM_SIZE_OPTIONS = [1, 2, 3, 4, 5, 6];

function unwrapPrompt<T>(value: T | symbol): T {
  if (isCancel(value)) {
    cancel("Evaluation canceled.");
    process.exit(1);
  }
  return value;
}

function required(label: string) {
  return (value: string): string | undefined => (value.trim() ? undefined : `${label} is required.`);
}

export function withDefaults(raw: RawIdeaInput): RawIdeaInput {
  return {
    ...raw,
    teamSize: raw.teamSize ?? DEFAULT_TEAM_SIZE,
    hoursAvailable: raw.hoursAvailable ?? DEFAULT_HOURS,
  };
}

export function isComplete(raw: RawIdeaInput): boolean {
  return (
    raw.idea !== undefined &&
    raw.targetUsers !== undefined &&
    raw.goals !== undefined &&
    raw.teamSize !== undefined &&
    raw.hoursAvailable !== undefined
  );
}

/** Ask for every field the command line left out. */
export async function collectIdeaInput(partial: RawIdeaInput): Promise<RawIdeaInput> {
  intro("Tell us about your hackathon idea");

  const idea =
    partial.idea ??
    unwrapPrompt<string>(
      await text({
        message: "Describe your hackathon idea",
        placeholder: "e.g. An AI tool that matches students into study groups by schedule and learning style",
        validate: required("Idea description"),
      })
    );

  const targetUsers =
    partial.targetUsers ??
    unwrapPrompt<string>(
      await text({
        message: "Who are your target users?",
        placeholder: "e.g. College students, working professionals, parents",
        validate: required("Target users"),
      })
    );

  const hoursAvailable =
    partial.hoursAvailable ??
    unwrapPrompt<number>(
      await select({
        message: "Time available (hours)",
        initialValue: DEFAULT_HOURS,
        options: HOUR_OPTIONS.map((h) => ({ value: h, label: `${h} hours` })),
      })
    );

  const teamSize =
    partial.teamSize ??
    unwrapPrompt<number>(
      await select({
        message: "Team size",
        initialValue: DEFAULT_TEAM_SIZE,
        options: TEAM_SIZE_OPTIONS.map((n) => ({ value: n, label: n === 1 ? "Solo" : `${n} people` })),
      })
    );

  const goals =
    partial.goals ??
    unwrapPrompt<string>(
      await text({
        message: "What are your goals for this hackathon?",
        placeholder: "e.g. Build a working prototype, learn new technologies, win",
        validate: required("Goals"),
      })
    );

  return { idea, targetUsers, goals, teamSize, hoursAvailable };
}
