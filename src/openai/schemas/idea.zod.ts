import { z } from "zod";

const requiredText = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .refine((value) => value.trim().length > 0, `${label} is required`);

const wholeNumber = (label: string) =>
  z
    .number({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
    .int(`${label} must be a whole number`)
    .min(1, `${label} must be at least 1`);

export const IdeaInputSchema = z.object({
  idea: requiredText("Idea description"),
  targetUsers: requiredText("Target users"),
  goals: requiredText("Goals"),
  teamSize: wholeNumber("Team size"),
  hoursAvailable: wholeNumber("Hours available"),
});

export type IdeaInput = Readonly<z.output<typeof IdeaInputSchema>>;
