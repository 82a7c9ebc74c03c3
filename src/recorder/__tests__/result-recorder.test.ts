import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  ResultRecorder,
  formatFileTimestamp,
  resultsFileName,
} from "../result-recorder";
import { deserializeRunResults } from "../../types/serialization";
import { fixedClock, makeConfig } from "../../__tests__/mocks/fake-api-server";

const okResponse = {
  statusCode: 200,
  headers: {},
  data: [],
  url: "https://api.test.local/manage/v1/artists",
  method: "GET" as const,
  attempt: 1,
  durationMs: 12,
};

describe("ResultRecorder", () => {
  let recorder: ResultRecorder;
  let outputDir: string;

  beforeEach(async () => {
    recorder = new ResultRecorder(makeConfig("sandbox", { iss: "test-issuer" }), {
      clock: fixedClock,
    });
    outputDir = await fs.mkdtemp(join(tmpdir(), "recorder-test-"));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it("should count one entry per status", () => {
    recorder.record("basic_auth", "PASSED", okResponse);
    recorder.record("jwt_auth", "SKIPPED", { reason: "No secret key configured" });
    recorder.record("list_campaigns", "WARNING", { ...okResponse, statusCode: 404 });
    recorder.record("create_smartlink", "FAILED", { error: "Request timeout" });

    expect(recorder.summary).toEqual({
      total: 4,
      passed: 1,
      failed: 1,
      skipped: 1,
      warnings: 1,
    });
    expect(recorder.successRate()).toBe(25);
  });

  it("should replace an earlier outcome for the same test", () => {
    recorder.record("basic_auth", "FAILED", { error: "Network Error" });
    recorder.record("basic_auth", "PASSED", okResponse);

    expect(recorder.summary.total).toBe(1);
    expect(recorder.summary.failed).toBe(0);
    expect(recorder.getErrors()).toEqual([]);
  });

  it("should take the error from the failure or the response body", () => {
    recorder.record("a", "FAILED", { error: "Request timeout", url: "u", method: "GET" });
    recorder.record("b", "FAILED", { ...okResponse, statusCode: 500, data: { message: "boom" } });
    recorder.record("c", "FAILED", { reason: "manual" });

    expect(recorder.getErrors()).toEqual([
      { test: "a", error: "Request timeout" },
      { test: "b", error: { message: "boom" } },
      { test: "c", error: "Unknown error" },
    ]);
  });

  it("should track endpoints and resources without duplicates", () => {
    recorder.recordEndpoint("https://api.test.local/manage/v1/artists");
    recorder.recordEndpoint("https://api.test.local/manage/v1/artists");
    recorder.addResource("artists", "a1");
    recorder.addResource("artists", "a1");
    recorder.addResource("webhooks", "w1");

    expect(recorder.getEndpoints()).toHaveLength(1);
    expect(recorder.getResources()).toEqual({ artists: ["a1"], webhooks: ["w1"] });
  });

  it("should mask the API key in the results document", () => {
    const results = recorder.toJSON();

    expect(results.credentials).toEqual({ apiKey: "test-api...", iss: "test-issuer" });
    expect(results.environment).toBe("sandbox");
    expect(results.timestamp).toBe(fixedClock().toISOString());
  });

  it("should save a timestamped file that reads back as valid results", async () => {
    recorder.record("basic_auth", "PASSED", okResponse);

    const filePath = await recorder.save("sandbox_test_results", outputDir);

    expect(filePath).toBe(join(outputDir, "sandbox_test_results_sandbox_20240115_103000.json"));
    const { results, validation } = deserializeRunResults(await fs.readFile(filePath, "utf-8"));
    expect(validation.isValid).toBe(true);
    expect(results?.tests.basic_auth.status).toBe("PASSED");
  });

  it("should create a missing output directory", async () => {
    const nested = join(outputDir, "reports", "nightly");

    const filePath = await recorder.save("run", nested);

    await expect(fs.stat(filePath)).resolves.toBeTruthy();
  });

  it("should explain where a save failed", async () => {
    const blocker = join(outputDir, "not-a-dir");
    await fs.writeFile(blocker, "x");

    await expect(recorder.save("run", blocker)).rejects.toThrow(
      `Failed to save results to ${join(blocker, "run_sandbox_20240115_103000.json")}`
    );
  });
});

describe("resultsFileName", () => {
  it("should combine prefix, environment and local timestamp", () => {
    const at = new Date(2024, 10, 5, 7, 8, 9);

    expect(formatFileTimestamp(at)).toBe("20241105_070809");
    expect(resultsFileName("production_test_results", "production", at)).toBe(
      "production_test_results_production_20241105_070809.json"
    );
  });
});
