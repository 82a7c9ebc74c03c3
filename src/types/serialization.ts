import type { ValidationResult } from "./common";
import type { RunResults } from "./test-result";
import { validateRunResults } from "./validation";

/**
 * Serializes run results to the pretty-printed JSON written at the end of a run
 */
export function serializeRunResults(results: RunResults): string {
  try {
    return JSON.stringify(results, null, 2);
  } catch (error) {
    throw new Error(
      `Failed to serialize run results: ${
        error instanceof Error ? error.message : "Unknown error"
      }`
    );
  }
}

/**
 * Parses a results file back into RunResults with validation
 */
export function deserializeRunResults(json: string): {
  results: RunResults | null;
  validation: ValidationResult;
} {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      results: null,
      validation: {
        isValid: false,
        errors: [
          `Invalid JSON format: ${
            error instanceof Error ? error.message : "Unknown error"
          }`,
        ],
        warnings: [],
      },
    };
  }

  const validation = validateRunResults(parsed);
  if (!validation.isValid || !isRunResults(parsed)) {
    return { results: null, validation };
  }
  return { results: parsed, validation };
}

function isRunResults(value: unknown): value is RunResults {
  return (
    typeof value === "object" &&
    value !== null &&
    "summary" in value &&
    "tests" in value
  );
}
