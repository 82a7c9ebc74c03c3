import { describe, it, expect } from "vitest";
import {
  validateApiConfig,
  validateResponseShape,
  validateRunResults,
} from "../validation";
import { classifyStatus, isEnvironment } from "../common";
import type { RunResults } from "../test-result";

const validConfig = {
  environment: "sandbox",
  apiKey: "test-api-key",
  baseUrl: "https://api.test.local",
  timeoutMs: 10000,
  retryCount: 3,
};

function sampleResults(): RunResults {
  return {
    timestamp: "2024-01-15T10:30:00.000Z",
    environment: "sandbox",
    credentials: { apiKey: "test-api...", iss: null },
    endpointsTested: ["https://api.test.local/manage/v1/artists"],
    tests: {
      basic_auth: {
        status: "PASSED",
        timestamp: "2024-01-15T10:30:01.000Z",
        details: {
          statusCode: 200,
          headers: {},
          data: [],
          url: "https://api.test.local/manage/v1/artists",
          method: "GET",
          attempt: 1,
          durationMs: 15,
        },
      },
      jwt_auth: {
        status: "SKIPPED",
        timestamp: "2024-01-15T10:30:02.000Z",
        details: { reason: "No secret key configured" },
      },
    },
    summary: { total: 2, passed: 1, failed: 0, skipped: 1, warnings: 0 },
    errors: [],
    resources: {},
  };
}

describe("Validation Functions", () => {
  describe("validateApiConfig", () => {
    it("should accept a complete configuration", () => {
      const result = validateApiConfig(validConfig);

      expect(result.isValid).toBe(true);
      expect(result.errors).toHaveLength(0);
    });

    it("should reject an unknown environment", () => {
      const result = validateApiConfig({ ...validConfig, environment: "staging" });

      expect(result.isValid).toBe(false);
      expect(result.errors).toContain(
        '"environment" must be one of [sandbox, production]'
      );
    });

    it("should reject an empty API key", () => {
      const result = validateApiConfig({ ...validConfig, apiKey: "" });

      expect(result.isValid).toBe(false);
      expect(result.errors).toContain('"apiKey" is not allowed to be empty');
    });

    it("should reject a retry count below one", () => {
      const result = validateApiConfig({ ...validConfig, retryCount: 0 });

      expect(result.errors).toContain(
        '"retryCount" must be greater than or equal to 1'
      );
    });

    it("should report every problem at once", () => {
      const result = validateApiConfig({
        ...validConfig,
        baseUrl: "ftp://api.test.local",
        timeoutMs: -1,
      });

      expect(result.errors).toHaveLength(2);
    });
  });

  describe("validateResponseShape", () => {
    it("should accept an artist list with extra fields", () => {
      const result = validateResponseShape("artistList", [
        { id: "a1", artistName: "Test Artist", followers: 12 },
      ]);

      expect(result.isValid).toBe(true);
    });

    it("should reject a wrapped list where an array is expected", () => {
      const result = validateResponseShape("artistList", { data: [] });

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(['"value" must be an array']);
    });

    it("should require an id on created resources", () => {
      expect(validateResponseShape("createdResource", { id: 42 }).isValid).toBe(true);

      const result = validateResponseShape("createdResource", { name: "x" });
      expect(result.errors).toEqual(['"id" is required']);
    });
  });

  describe("validateRunResults", () => {
    it("should accept a consistent results document", () => {
      expect(validateRunResults(sampleResults()).isValid).toBe(true);
    });

    it("should reject a summary that disagrees with the recorded tests", () => {
      const results = sampleResults();
      results.summary.total = 3;

      const validation = validateRunResults(results);

      expect(validation.isValid).toBe(false);
      expect(validation.errors).toEqual([
        "Summary total 3 does not match 2 recorded tests",
      ]);
    });

    it("should reject an unknown test status", () => {
      const results = sampleResults();
      const tests: Record<string, unknown> = { ...results.tests };
      tests.basic_auth = { ...results.tests.basic_auth, status: "OK" };

      expect(validateRunResults({ ...results, tests }).isValid).toBe(false);
    });
  });
});

describe("classifyStatus", () => {
  it.each([
    [0, "network_error"],
    [200, "success"],
    [302, "success"],
    [404, "client_error"],
    [429, "client_error"],
    [503, "server_error"],
  ])("should classify %i as %s", (code, expected) => {
    expect(classifyStatus(code)).toBe(expected);
  });
});

describe("isEnvironment", () => {
  it("should only accept the two known environments", () => {
    expect(isEnvironment("sandbox")).toBe(true);
    expect(isEnvironment("production")).toBe(true);
    expect(isEnvironment("Production")).toBe(false);
  });
});
