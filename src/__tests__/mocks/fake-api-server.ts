/**
 * In-process stand-in for the Feature.fm API.
 * Routes "METHOD /path" to queued replies and records every request it sees.
 */

import { AxiosError, type AxiosAdapter } from "axios";
import { ApiConfig, type ApiConfigOptions } from "../../config/api-config";
import type { Environment } from "../../types";

export type FakeReply =
  | { status: number; data?: unknown; headers?: Record<string, string> }
  | { error: "timeout" | "network" };

export interface RecordedCall {
  method: string;
  path: string;
  url: string;
  params: Record<string, unknown>;
  body: unknown;
  headers: Record<string, string>;
}

export const TEST_BASE_URL = "https://api.test.local";

export class FakeApiServer {
  readonly calls: RecordedCall[] = [];
  private routes: Map<string, FakeReply[]> = new Map();
  private fallback: FakeReply = { status: 404, data: { message: "Not found" } };

  /**
   * Queues replies for a route. The last reply keeps answering once the
   * queue is down to one entry.
   */
  on(method: string, path: string, ...replies: FakeReply[]): this {
    this.routes.set(`${method.toUpperCase()} ${path}`, replies);
    return this;
  }

  otherwise(reply: FakeReply): this {
    this.fallback = reply;
    return this;
  }

  callsTo(method: string, path: string): RecordedCall[] {
    return this.calls.filter(
      (call) => call.method === method.toUpperCase() && call.path === path
    );
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const method = (config.method ?? "get").toUpperCase();
    const url = new URL(config.url ?? "/", TEST_BASE_URL);

    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(config.headers.toJSON())) {
      if (typeof value === "string") headers[key.toLowerCase()] = value;
    }

    this.calls.push({
      method,
      path: url.pathname,
      url: config.url ?? "",
      params: toRecord(config.params),
      body: typeof config.data === "string" ? JSON.parse(config.data) : null,
      headers,
    });

    const reply = this.next(`${method} ${url.pathname}`);
    if ("error" in reply) {
      throw reply.error === "timeout"
        ? new AxiosError("timeout of 10000ms exceeded", AxiosError.ECONNABORTED, config)
        : new AxiosError("Network Error", AxiosError.ERR_NETWORK, config);
    }

    return {
      data: reply.data ?? null,
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
    };
  };

  private next(route: string): FakeReply {
    const queue = this.routes.get(route);
    if (!queue || queue.length === 0) return this.fallback;
    return queue.length > 1 ? queue.shift() ?? this.fallback : queue[0];
  }
}

function toRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null ? { ...value } : {};
}

export function makeConfig(
  environment: Environment,
  overrides: Partial<ApiConfigOptions> = {}
): ApiConfig {
  return new ApiConfig({
    environment,
    apiKey: "test-api-key-123456",
    baseUrl: TEST_BASE_URL,
    timeoutMs: 10000,
    retryCount: 3,
    ...overrides,
  });
}

/** 2024-01-15 10:30:00 local time */
export const fixedClock = (): Date => new Date(2024, 0, 15, 10, 30, 0);

export const noSleep = async (): Promise<void> => {};
