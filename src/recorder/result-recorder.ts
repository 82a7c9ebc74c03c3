import { promises as fs } from "fs";
import { join } from "path";
import type {
  ErrorEntry,
  RunResults,
  RunSummary,
  TestDetails,
  TestRecord,
  TestStatus,
} from "../types";
import { serializeRunResults } from "../types/serialization";
import type { ApiConfig } from "../config/api-config";

export interface ResultRecorderOptions {
  clock?: () => Date;
}

/**
 * Collects test outcomes for a single run. Every test name maps to exactly
 * one record; recording a name twice replaces the earlier outcome.
 */
export class ResultRecorder {
  private config: ApiConfig;
  private clock: () => Date;
  private startedAt: Date;
  private tests: Record<string, TestRecord> = {};
  private endpoints: string[] = [];
  private errors: ErrorEntry[] = [];
  private resources: Record<string, string[]> = {};

  constructor(config: ApiConfig, options: ResultRecorderOptions = {}) {
    this.config = config;
    this.clock = options.clock ?? (() => new Date());
    this.startedAt = this.clock();
  }

  recordEndpoint(url: string): void {
    if (!this.endpoints.includes(url)) {
      this.endpoints.push(url);
    }
  }

  record(testName: string, status: TestStatus, details: TestDetails): void {
    this.errors = this.errors.filter((entry) => entry.test !== testName);

    this.tests[testName] = {
      status,
      timestamp: this.clock().toISOString(),
      details,
    };

    if (status === "FAILED") {
      this.errors.push({ test: testName, error: describeError(details) });
    }
  }

  addResource(kind: string, id: string): void {
    const ids = this.resources[kind] ?? [];
    if (!ids.includes(id)) ids.push(id);
    this.resources[kind] = ids;
  }

  getResources(): Record<string, string[]> {
    return Object.fromEntries(
      Object.entries(this.resources).map(([kind, ids]) => [kind, [...ids]])
    );
  }


  getErrors(): ErrorEntry[] {
    return [...this.errors];
  }

  getEndpoints(): string[] {
    return [...this.endpoints];
  }

  get summary(): RunSummary {
    const summary: RunSummary = {
      total: 0,
      passed: 0,
      failed: 0,
      skipped: 0,
      warnings: 0,
    };

    for (const record of Object.values(this.tests)) {
      summary.total++;
      switch (record.status) {
        case "PASSED":
          summary.passed++;
          break;
        case "FAILED":
          summary.failed++;
          break;
        case "SKIPPED":
          summary.skipped++;
          break;
        case "WARNING":
          summary.warnings++;
          break;
      }
    }

    return summary;
  }

  /** Percentage of recorded tests that passed, 0 when nothing ran. */
  successRate(): number {
    const { total, passed } = this.summary;
    return total > 0 ? (passed / total) * 100 : 0;
  }

  toJSON(): RunResults {
    return {
      timestamp: this.startedAt.toISOString(),
      environment: this.config.environment,
      credentials: {
        apiKey: this.config.maskedApiKey(),
        iss: this.config.iss ?? null,
      },
      endpointsTested: this.getEndpoints(),
      tests: { ...this.tests },
      summary: this.summary,
      errors: this.getErrors(),
      resources: this.getResources(),
    };
  }

  /**
   * Writes `<prefix>_<environment>_<YYYYMMDD_HHMMSS>.json` and returns its path
   */
  async save(prefix: string, outputDir: string = process.cwd()): Promise<string> {
    const fileName = resultsFileName(prefix, this.config.environment, this.clock());
    const filePath = join(outputDir, fileName);

    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(filePath, serializeRunResults(this.toJSON()), "utf-8");
    } catch (error) {
      throw new Error(
        `Failed to save results to ${filePath}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    return filePath;
  }
}

function describeError(details: TestDetails): unknown {
  if ("error" in details) return details.error;
  if ("data" in details) return details.data;
  return "Unknown error";
}

export function resultsFileName(prefix: string, environment: string, at: Date): string {
  return `${prefix}_${environment}_${formatFileTimestamp(at)}.json`;
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatFileTimestamp(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
