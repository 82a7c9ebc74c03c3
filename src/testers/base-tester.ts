import type {
  ApiResponse,
  RequestOutcome,
  ResponseShape,
  RunResults,
  TestDetails,
  TestStatus,
} from "../types";
import { classifyStatus } from "../types/common";
import { validateResponseShape } from "../types/validation";
import type { ApiConfig } from "../config/api-config";
import { ApiClient, type ApiClientOptions } from "../client/api-client";
import { ResultRecorder } from "../recorder/result-recorder";
import { ResultDisplayManager } from "../cli/result-display";

export interface TesterOptions {
  verbose?: boolean;
  display?: ResultDisplayManager;
  clientOptions?: Omit<ApiClientOptions, "hooks" | "clock">;
  clock?: () => Date;
  /** Directory the JSON results file is written to. */
  outputDir?: string;
}

export interface TestCase {
  name: string;
  category: string;
  description: string;
  run: () => Promise<unknown>;
}

export interface PassReport {
  message: string;
  status?: TestStatus;
  notes?: string[];
}

export interface FailReport {
  message: string;
  status: TestStatus;
}

export type FailedOutcome = Exclude<RequestOutcome, { success: true }>;

export interface OutcomeHandlers {
  pass: (response: ApiResponse) => PassReport;
  fail: (outcome: FailedOutcome) => FailReport;
}

/**
 * Shared plumbing for every suite: one client, one recorder and one display
 * per run. Subclasses add their tests and a catalog describing them.
 */
export abstract class BaseApiTester {
  protected readonly config: ApiConfig;
  protected readonly client: ApiClient;
  protected readonly recorder: ResultRecorder;
  protected readonly display: ResultDisplayManager;
  protected readonly clock: () => Date;
  protected readonly outputDir: string;

  protected abstract readonly resultsPrefix: string;

  constructor(config: ApiConfig, options: TesterOptions = {}) {
    this.config = config;
    this.clock = options.clock ?? (() => new Date());
    this.outputDir = options.outputDir ?? process.cwd();
    this.display =
      options.display ?? new ResultDisplayManager({ verbose: options.verbose });
    this.recorder = new ResultRecorder(config, { clock: this.clock });
    this.client = new ApiClient(config, {
      ...options.clientOptions,
      clock: this.clock,
      hooks: {
        onRequest: (url) => this.recorder.recordEndpoint(url),
        onRateLimited: (waitSeconds) =>
          this.display.status(
            `Rate limited. Waiting ${waitSeconds} seconds...`,
            "WARNING",
            2
          ),
      },
    });
  }

  abstract catalog(): TestCase[];

  abstract runAllTests(): Promise<boolean>;

  // ========== AUTHENTICATION ==========

  async testBasicAuth(): Promise<boolean> {
    this.display.testTitle("Basic API Key Authentication");
    const outcome = await this.client.request("/artists");

    return this.settle("basic_auth", outcome, {
      pass: (response) => ({
        message: "API key authentication successful",
        notes: [`Response: ${response.statusCode}`],
      }),
      fail: (failed) => ({
        message: `Authentication failed: ${failureMessage(failed)}`,
        status: "FAILED",
      }),
    });
  }

  async testJwtAuth(): Promise<boolean> {
    this.display.testTitle("JWT Token Authentication");
    if (!this.config.secretKey) {
      return this.skip("jwt_auth", "No secret key configured");
    }

    const outcome = await this.client.request("/artists", { auth: "jwt" });
    return this.settle("jwt_auth", outcome, {
      pass: () => ({ message: "JWT authentication successful" }),
      fail: () => ({
        message: "JWT authentication not required or failed",
        status: "WARNING",
      }),
    });
  }

  async testHmacAuth(): Promise<boolean> {
    this.display.testTitle("HMAC Signed Request");
    if (!this.config.secretKey) {
      return this.skip("hmac_auth", "No secret key configured");
    }

    const outcome = await this.client.request("/artists", { auth: "hmac" });
    return this.settle("hmac_auth", outcome, {
      pass: () => ({ message: "HMAC signed request accepted" }),
      fail: () => ({
        message: "HMAC signing not required or rejected",
        status: "WARNING",
      }),
    });
  }

  protected authCases(): TestCase[] {
    return [
      {
        name: "basic_auth",
        category: "Authentication",
        description: "API key authentication",
        run: () => this.testBasicAuth(),
      },
      {
        name: "jwt_auth",
        category: "Authentication",
        description: "JWT bearer token authentication",
        run: () => this.testJwtAuth(),
      },
      {
        name: "hmac_auth",
        category: "Authentication",
        description: "HMAC request signing",
        run: () => this.testHmacAuth(),
      },
    ];
  }

  // ========== CATALOG ==========

  listTests(): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    for (const testCase of this.catalog()) {
      const names = groups.get(testCase.category) ?? [];
      names.push(testCase.name);
      groups.set(testCase.category, names);
    }
    return groups;
  }

  async runSpecificTest(testName: string): Promise<boolean> {
    const testCase = this.catalog().find((candidate) => candidate.name === testName);

    if (!testCase) {
      this.display.error(`Test not found: ${testName}`);
      this.display.testCatalog(this.listTests());
      return false;
    }

    this.display.info(`\nRunning single test: ${testName}`);
    await testCase.run();
    return this.finish();
  }

  getResults(): RunResults {
    return this.recorder.toJSON();
  }

  // ========== RECORDING ==========

  /**
   * Turns a request outcome into a recorded status. Returns whether the
   * request itself succeeded, independent of a WARNING from shape checks.
   */
  protected settle(
    testName: string,
    outcome: RequestOutcome,
    handlers: OutcomeHandlers
  ): boolean {
    if (outcome.success) {
      const report = handlers.pass(outcome.response);
      const status = report.status ?? "PASSED";
      this.display.status(report.message, status, 1);
      report.notes?.forEach((note) => this.display.status(note, undefined, 2));
      this.recorder.record(testName, status, outcome.response);
      return true;
    }

    const report = handlers.fail(outcome);
    this.display.status(report.message, report.status, 1);
    this.recorder.record(testName, report.status, outcomeDetails(outcome));
    return false;
  }

  protected skip(testName: string, reason: string): false {
    this.display.status(`Skipping - ${reason}`, "SKIPPED", 1);
    this.recorder.record(testName, "SKIPPED", { reason });
    return false;
  }

  protected matchesShape(shape: ResponseShape, data: unknown): boolean {
    return validateResponseShape(shape, data).isValid;
  }

  /** Prints the summary, writes the results file and reports overall success. */
  protected async finish(): Promise<boolean> {
    this.display.summary(
      this.config.getEnvName(),
      this.recorder.summary,
      this.recorder.getEndpoints().length,
      this.recorder.getErrors()
    );
    await this.saveResults();
    return this.recorder.summary.failed === 0;
  }

  protected async saveResults(): Promise<string | null> {
    try {
      const filePath = await this.recorder.save(this.resultsPrefix, this.outputDir);
      this.display.success(`\n✓ Results saved to: ${filePath}`);
      return filePath;
    } catch (error) {
      this.display.error(
        `\n✗ ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }
  }
}

export function outcomeDetails(outcome: FailedOutcome): TestDetails {
  return "response" in outcome ? outcome.response : outcome.failure;
}

export function outcomeStatusCode(outcome: FailedOutcome): number {
  return "response" in outcome
    ? outcome.response.statusCode
    : outcome.failure.statusCode ?? 0;
}

export function failureMessage(outcome: FailedOutcome): string {
  if (!("response" in outcome)) return outcome.failure.error;
  const { statusCode } = outcome.response;
  return `HTTP ${statusCode} (${classifyStatus(statusCode)})`;
}

/** Reads a string-ish field from an untyped JSON object. */
export function field(data: unknown, key: string): string | undefined {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return undefined;
  }
  const value: unknown = Reflect.get(data, key);
  if (typeof value === "string") return value;
  if (typeof value === "number") return value.toString();
  return undefined;
}

export function asList(data: unknown): unknown[] {
  return Array.isArray(data) ? data : [];
}
