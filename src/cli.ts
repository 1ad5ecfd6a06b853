#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import dotenv from "dotenv";
import { loadConfig, type Config } from "./config.js";
import { ConfigError } from "./errors.js";

dotenv.config();

function parseWholeNumber(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError("Expected a whole number.");
  }
  return n;
}

// Read once, before any command runs; a missing credential stops the process.
let config: Config | null = null;

const program = new Command();

program
  .name("idea-coach")
  .description("Score a hackathon idea across eight dimensions and draft a plan and 5-slide pitch deck")
  .version("1.0.0")
  .hook("preAction", () => {
    try {
      config = loadConfig();
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(`Error: ${error.message}`);
        process.exit(1);
      }
      throw error;
    }
  });

program
  .command("evaluate")
  .description("Evaluate an idea (fields not given as options are asked for interactively)")
  .option("--idea <string>", "Describe your hackathon idea")
  .option("--users <string>", "Who are your target users?")
  .option("--goals <string>", "What are your goals for this hackathon?")
  .option("--team-size <number>", "Team size (default 3)", parseWholeNumber)
  .option("--hours <number>", "Time available in hours (default 48)", parseWholeNumber)
  .addOption(new Option("--format <format>", "Output format").choices(["markdown", "json"]).default("markdown"))
  .option("--no-interactive", "Never prompt; fail on missing fields")
  .option("--verbose", "Show model and token usage", false)
  .action(async (options) => {
    if (!config) throw new Error("Configuration was not loaded before the command ran.");
    const { runEvaluation, describeFailure } = await import("./pipeline/run.js");
    try {
      await runEvaluation({
        config,
        input: {
          idea: options.idea,
          targetUsers: options.users,
          goals: options.goals,
          teamSize: options.teamSize,
          hoursAvailable: options.hours,
        },
        format: options.format === "json" ? "json" : "markdown",
        interactive: options.interactive && Boolean(process.stdin.isTTY),
        verbose: options.verbose,
      });
    } catch (error) {
      console.error("\n" + describeFailure(error));
      process.exit(1);
    }
  });

await program.parseAsync();
