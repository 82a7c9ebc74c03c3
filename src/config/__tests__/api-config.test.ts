import { describe, it, expect } from "vitest";
import {
  ApiConfig,
  DEFAULT_BASE_URL,
  describeConfiguration,
  loadConfig,
} from "../api-config";
import { ConfigurationError, HarnessErrorType, WritePermissionError } from "../errors";

const env = {
  FEATUREFM_API_KEY: "generic-key-000",
  FEATUREFM_SANDBOX_API_KEY: "sandbox-key-111",
  FEATUREFM_SANDBOX_SECRET_KEY: "test-secret",
  FEATUREFM_ISS: "test-issuer",
  FEATUREFM_RETRY_COUNT: "2",
};

describe("loadConfig", () => {
  it("should prefer environment-specific variables over generic ones", () => {
    const config = loadConfig("sandbox", {}, env);

    expect(config.apiKey).toBe("sandbox-key-111");
    expect(config.secretKey).toBe("test-secret");
    expect(config.iss).toBe("test-issuer");
    expect(config.retryCount).toBe(2);
    expect(config.timeoutMs).toBe(10000);
  });

  it("should fall back to generic variables", () => {
    const config = loadConfig("production", {}, env);

    expect(config.apiKey).toBe("generic-key-000");
    expect(config.secretKey).toBeUndefined();
    expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
  });

  it("should let command line overrides win", () => {
    const config = loadConfig(
      "sandbox",
      { apiKey: "cli-key-222", baseUrl: "https://api.test.local/" },
      env
    );

    expect(config.apiKey).toBe("cli-key-222");
    expect(config.baseUrl).toBe("https://api.test.local");
    expect(config.manageBase).toBe("https://api.test.local/manage/v1");
    expect(config.marketingBase).toBe("https://api.test.local/v2");
  });

  it("should treat blank values as unset", () => {
    expect(() =>
      loadConfig("sandbox", { apiKey: "  " }, { FEATUREFM_SANDBOX_API_KEY: "" })
    ).toThrow(
      "Missing API key for the sandbox environment. Set FEATUREFM_SANDBOX_API_KEY or FEATUREFM_API_KEY, or pass --api-key"
    );
  });

  it("should reject values that fail validation", () => {
    expect(() =>
      loadConfig("sandbox", {}, { ...env, FEATUREFM_RETRY_COUNT: "20" })
    ).toThrow(ConfigurationError);
  });
});

describe("ApiConfig", () => {
  const make = (environment: "sandbox" | "production") =>
    new ApiConfig({
      environment,
      apiKey: "abcdefghijkl",
      baseUrl: "https://api.test.local",
      timeoutMs: 5000,
      retryCount: 1,
    });

  it("should mask all but the first eight characters of the key", () => {
    expect(make("sandbox").maskedApiKey()).toBe("abcdefgh...");
  });

  it("should only allow writes in the sandbox", () => {
    expect(make("sandbox").canWrite()).toBe(true);
    expect(make("production").canWrite()).toBe(false);
  });

  it("should refuse a write operation in production", () => {
    const config = make("production");

    expect(() => config.requireWritePermission("create_artist")).toThrow(
      "Write operation 'create_artist' is not permitted in the Production environment"
    );
  });

  it("should allow GET everywhere and block other verbs in production", () => {
    const production = make("production");

    expect(() => production.assertMethodAllowed("GET", "/artists")).not.toThrow();
    expect(() => make("sandbox").assertMethodAllowed("DELETE", "/artist/1")).not.toThrow();

    try {
      production.assertMethodAllowed("PATCH", "/artist/1");
      expect.unreachable("PATCH should have been blocked");
    } catch (error) {
      expect(error).toBeInstanceOf(WritePermissionError);
      if (error instanceof WritePermissionError) {
        expect(error.type).toBe(HarnessErrorType.WRITE_PERMISSION);
        expect(error.context).toEqual({
          environment: "production",
          method: "PATCH",
          target: "/artist/1",
        });
        expect(error.toJSON().message).toBe(
          "PATCH /artist/1 blocked: write operations are disabled in the Production environment"
        );
      }
    }
  });
});

describe("describeConfiguration", () => {
  it("should report each environment separately", () => {
    const reports = describeConfiguration({
      FEATUREFM_SANDBOX_API_KEY: "sandbox-key-111",
      FEATUREFM_SANDBOX_SECRET_KEY: "test-secret",
    });

    expect(reports).toEqual([
      {
        environment: "sandbox",
        configured: true,
        apiKey: "sandbox-...",
        hasSecret: true,
        iss: null,
        baseUrl: DEFAULT_BASE_URL,
      },
      {
        environment: "production",
        configured: false,
        apiKey: null,
        hasSecret: false,
        iss: null,
        baseUrl: null,
        error:
          "Missing API key for the production environment. Set FEATUREFM_PRODUCTION_API_KEY or FEATUREFM_API_KEY, or pass --api-key",
      },
    ]);
  });
});
