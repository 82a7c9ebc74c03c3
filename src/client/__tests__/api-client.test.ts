import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import { ApiClient, isSuccessStatus } from "../api-client";
import { WritePermissionError, ConfigurationError } from "../../config/errors";
import {
  FakeApiServer,
  TEST_BASE_URL,
  fixedClock,
  makeConfig,
} from "../../__tests__/mocks/fake-api-server";

const ARTISTS = "/manage/v1/artists";

describe("ApiClient", () => {
  let server: FakeApiServer;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    server = new FakeApiServer();
    sleep = vi.fn(async (_ms: number) => {});
  });

  const client = (environment: "sandbox" | "production" = "sandbox", secretKey?: string) =>
    new ApiClient(makeConfig(environment, { secretKey }), {
      adapter: server.adapter,
      sleep,
      clock: fixedClock,
    });

  describe("capability guard", () => {
    it("should reject a production write before anything is sent", async () => {
      const onRequest = vi.fn();
      const api = client("production");
      api.setHooks({ onRequest });

      for (const method of ["POST", "PUT", "PATCH", "DELETE"] as const) {
        await expect(api.request("/artist", { method, body: {} })).rejects.toThrow(
          WritePermissionError
        );
      }

      expect(server.calls).toHaveLength(0);
      expect(onRequest).not.toHaveBeenCalled();
    });

    it("should let production reads through", async () => {
      server.on("GET", ARTISTS, { status: 200, data: [] });

      const outcome = await client("production").request("/artists");

      expect(outcome.success).toBe(true);
      expect(server.calls).toHaveLength(1);
    });

    it("should let sandbox writes through", async () => {
      server.on("POST", "/manage/v1/artist", { status: 201, data: { id: "a1" } });

      const outcome = await client().request("/artist", {
        method: "POST",
        body: { artistName: "Test" },
      });

      expect(outcome.success).toBe(true);
      expect(server.calls[0].body).toEqual({ artistName: "Test" });
    });
  });

  describe("URL resolution", () => {
    it("should put plain endpoints under the manage API", () => {
      expect(client().resolveUrl("/artists")).toBe(`${TEST_BASE_URL}/manage/v1/artists`);
    });

    it("should keep explicit /v2 and /manage paths at the root", () => {
      expect(client().resolveUrl("/v2/promoted")).toBe(`${TEST_BASE_URL}/v2/promoted`);
      expect(client().resolveUrl("/manage/v1/x")).toBe(`${TEST_BASE_URL}/manage/v1/x`);
    });

    it("should honour a base override", () => {
      expect(client().resolveUrl("/featured/song", TEST_BASE_URL)).toBe(
        `${TEST_BASE_URL}/featured/song`
      );
    });
  });

  describe("requests", () => {
    it("should send the API key and query parameters on GET", async () => {
      server.on("GET", "/manage/v1/smartlinks", { status: 200, data: [] });

      await client().request("/smartlinks", { query: { limit: 10, offset: 0 } });

      const [call] = server.calls;
      expect(call.headers["x-api-key"]).toBe("test-api-key-123456");
      expect(call.headers["user-agent"]).toBe("FeatureFM-API-Tester/2.0-sandbox");
      expect(call.params).toEqual({ limit: 10, offset: 0 });
      expect(call.body).toBeNull();
    });

    it("should add a bearer token for JWT auth", async () => {
      server.on("GET", ARTISTS, { status: 200, data: [] });

      await client("sandbox", "test-secret").request("/artists", { auth: "jwt" });

      expect(server.calls[0].headers.authorization).toMatch(/^Bearer [\w-]+\.[\w-]+\.[\w-]+$/);
    });

    it("should add a signature header for HMAC auth", async () => {
      server.on("GET", ARTISTS, { status: 200, data: [] });

      await client("sandbox", "test-secret").request("/artists", { auth: "hmac" });

      const timestamp = Math.floor(fixedClock().getTime() / 1000);
      expect(server.calls[0].headers["x-signature"]).toMatch(
        new RegExp(`^${timestamp}\\.[0-9a-f]{64}$`)
      );
    });

    it("should refuse HMAC auth without a secret", async () => {
      await expect(client().request("/artists", { auth: "hmac" })).rejects.toThrow(
        ConfigurationError
      );
      expect(server.calls).toHaveLength(0);
    });

    it("should report a 4xx response as an unsuccessful outcome", async () => {
      server.on("GET", ARTISTS, { status: 401, data: { message: "Unauthorized" } });

      const outcome = await client().request("/artists");

      expect(outcome.success).toBe(false);
      expect("response" in outcome && outcome.response.statusCode).toBe(401);
      expect("response" in outcome && outcome.response.data).toEqual({
        message: "Unauthorized",
      });
    });

    it("should wrap a non-JSON body", async () => {
      server.on("GET", ARTISTS, { status: 200, data: "<html>ok</html>" });

      const outcome = await client().request("/artists");

      expect(outcome.success && outcome.response.data).toEqual({
        rawResponse: "<html>ok</html>",
      });
    });
  });

  describe("retries", () => {
    it("should wait for Retry-After on 429 and try again", async () => {
      const onRateLimited = vi.fn();
      const api = client();
      api.setHooks({ onRateLimited });
      server.on(
        "GET",
        ARTISTS,
        { status: 429, headers: { "retry-after": "5" } },
        { status: 200, data: [] }
      );

      const outcome = await api.request("/artists");

      expect(outcome.success && outcome.response.attempt).toBe(2);
      expect(sleep).toHaveBeenCalledWith(5000);
      expect(onRateLimited).toHaveBeenCalledWith(5, `${TEST_BASE_URL}${ARTISTS}`);
    });

    it("should wait 60 seconds when Retry-After is missing", async () => {
      server.on("GET", ARTISTS, { status: 429 }, { status: 200, data: [] });

      await client().request("/artists");

      expect(sleep).toHaveBeenCalledWith(60000);
    });

    it("should return the last 429 without waiting once attempts run out", async () => {
      server.on("GET", ARTISTS, { status: 429, headers: { "retry-after": "30" } });

      const outcome = await client().request("/artists");

      expect(outcome.success).toBe(false);
      expect("response" in outcome && outcome.response.statusCode).toBe(429);
      expect("response" in outcome && outcome.response.attempt).toBe(3);
      expect(server.calls).toHaveLength(3);
      expect(sleep.mock.calls).toEqual([[30000], [30000]]);
    });

    it("should not wait on a 429 for a single-attempt request", async () => {
      server.on("GET", ARTISTS, { status: 429 });

      const outcome = await client().request("/artists", { retryCount: 1 });

      expect("response" in outcome && outcome.response.statusCode).toBe(429);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should back off exponentially on timeouts", async () => {
      server.on("GET", ARTISTS, { error: "timeout" });

      const outcome = await client().request("/artists");

      expect(!outcome.success && "failure" in outcome && outcome.failure.error).toBe(
        "Request timeout"
      );
      expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it("should not retry other transport errors", async () => {
      server.on("GET", ARTISTS, { error: "network" });

      const outcome = await client().request("/artists");

      expect(!outcome.success && "failure" in outcome && outcome.failure.error).toBe(
        "Network Error"
      );
      expect(server.calls).toHaveLength(1);
    });
  });
});

describe("isSuccessStatus", () => {
  it("should treat 2xx and 3xx as success", () => {
    expect(isSuccessStatus(200)).toBe(true);
    expect(isSuccessStatus(399)).toBe(true);
    expect(isSuccessStatus(400)).toBe(false);
    expect(isSuccessStatus(0)).toBe(false);
  });
});
