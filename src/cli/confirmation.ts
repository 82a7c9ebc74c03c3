import chalk from "chalk";
import type { Environment } from "../types";
import type { Prompter } from "./prompter";

export const CONFIRMATION_WORD = "yes";

/** Only the literal word, in any case, is accepted. */
export function isConfirmed(answer: string): boolean {
  return answer.toLowerCase() === CONFIRMATION_WORD;
}

/**
 * The production gate. Must resolve to true before any production request
 * is built.
 */
export async function confirmProduction(prompter: Prompter): Promise<boolean> {
  const answer = await prompter.input(
    chalk.yellow(
      `Are you sure you want to run tests against PRODUCTION? (type '${CONFIRMATION_WORD}' to confirm):`
    )
  );
  return isConfirmed(answer);
}

export async function promptEnvironment(prompter: Prompter): Promise<Environment> {
  return prompter.select<Environment>("Select environment", [
    { name: "Sandbox", value: "sandbox" },
    { name: "Production", value: "production" },
  ]);
}

/** Blank answers mean "skip the artist details test". */
export async function promptSampleArtistId(
  prompter: Prompter
): Promise<string | undefined> {
  const answer = await prompter.input(
    chalk.cyan(
      "Optional: Enter an artist ID to test detail retrieval (or press Enter to skip):"
    )
  );
  return answer.trim() || undefined;
}
