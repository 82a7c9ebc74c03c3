import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
} from "axios";
import type {
  ApiResponse,
  AuthMode,
  HttpMethod,
  RequestFailure,
  RequestOutcome,
} from "../types";
import type { ApiConfig } from "../config/api-config";
import { ConfigurationError } from "../config/errors";
import { generateHmacSignature, generateJwt } from "./auth";

export const DEFAULT_RETRY_AFTER_SECONDS = 60;

export interface RequestOptions {
  method?: HttpMethod;
  /** Sent as query parameters. */
  query?: Record<string, string | number>;
  /** Sent as a JSON body for POST, PUT and PATCH. */
  body?: object;
  auth?: AuthMode;
  baseOverride?: string;
  retryCount?: number;
}

export interface ApiClientHooks {
  onRequest?: (url: string, method: HttpMethod) => void;
  onRateLimited?: (waitSeconds: number, url: string) => void;
}

export interface ApiClientOptions {
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
  hooks?: ApiClientHooks;
}

export class ApiClient {
  private http: AxiosInstance;
  private config: ApiConfig;
  private sleep: (ms: number) => Promise<void>;
  private clock: () => Date;
  private hooks: ApiClientHooks;

  constructor(config: ApiConfig, options: ApiClientOptions = {}) {
    this.config = config;
    this.sleep =
      options.sleep ??
      ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.clock = options.clock ?? (() => new Date());
    this.hooks = options.hooks ?? {};

    this.http = axios.create({
      timeout: config.timeoutMs,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        "x-api-key": config.apiKey,
        "User-Agent": `FeatureFM-API-Tester/2.0-${config.environment}`,
      },
      validateStatus: () => true, // status codes are judged by the caller
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  setHooks(hooks: ApiClientHooks): void {
    this.hooks = { ...this.hooks, ...hooks };
  }

  resolveUrl(endpoint: string, baseOverride?: string): string {
    if (baseOverride) {
      return `${baseOverride}${endpoint}`;
    }
    if (endpoint.startsWith("/manage") || endpoint.startsWith("/v2")) {
      return `${this.config.baseUrl}${endpoint}`;
    }
    return `${this.config.manageBase}${endpoint}`;
  }

  async request(
    endpoint: string,
    options: RequestOptions = {}
  ): Promise<RequestOutcome> {
    const method = options.method ?? "GET";
    const url = this.resolveUrl(endpoint, options.baseOverride);

    // Nothing below may run for a forbidden verb, not even URL bookkeeping.
    this.config.assertMethodAllowed(method, url);

    const headers = await this.buildAuthHeaders(method, endpoint, options);
    this.hooks.onRequest?.(url, method);

    const attempts = options.retryCount ?? this.config.retryCount;
    const sendsBody = method === "POST" || method === "PUT" || method === "PATCH";

    for (let attempt = 0; attempt < attempts; attempt++) {
      const startedAt = this.clock().getTime();
      let response: AxiosResponse<unknown>;

      try {
        response = await this.http.request<unknown>({
          url,
          method,
          headers,
          params: method === "GET" ? options.query : undefined,
          data: sendsBody ? options.body : undefined,
        });
      } catch (error) {
        if (isTimeout(error)) {
          if (attempt < attempts - 1) {
            await this.sleep(2 ** attempt * 1000);
            continue;
          }
          return this.failure("Request timeout", url, method);
        }
        return this.failure(
          error instanceof Error ? error.message : String(error),
          url,
          method
        );
      }

      const apiResponse: ApiResponse = {
        statusCode: response.status,
        headers: flattenHeaders(response.headers),
        data: normalizeBody(response.data),
        url,
        method,
        attempt: attempt + 1,
        durationMs: this.clock().getTime() - startedAt,
      };

      if (response.status === 429 && attempt < attempts - 1) {
        const waitSeconds = parseRetryAfter(apiResponse.headers["retry-after"]);
        this.hooks.onRateLimited?.(waitSeconds, url);
        await this.sleep(waitSeconds * 1000);
        continue;
      }

      return isSuccessStatus(response.status)
        ? { success: true, response: apiResponse }
        : { success: false, response: apiResponse };
    }

    return this.failure("All retry attempts failed", url, method);
  }

  private async buildAuthHeaders(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions
  ): Promise<Record<string, string>> {
    const headers: Record<string, string> = {};
    const credentials = this.config.credentials;

    if (options.auth === "jwt") {
      const token = await generateJwt(credentials, {}, this.clock());
      headers.Authorization = `Bearer ${token}`;
    }

    if (options.auth === "hmac") {
      if (!credentials.secretKey) {
        throw new ConfigurationError("HMAC signing requires a secret key", {
          environment: this.config.environment,
        });
      }
      const body = options.body ? JSON.stringify(options.body) : "";
      headers["X-Signature"] = generateHmacSignature(
        credentials.secretKey,
        method,
        endpoint,
        body,
        this.clock()
      );
    }

    return headers;
  }

  private failure(
    error: string,
    url: string,
    method: HttpMethod
  ): RequestOutcome {
    const failure: RequestFailure = { error, url, method };
    return { success: false, failure };
  }
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 400;
}

function isTimeout(error: unknown): boolean {
  return (
    axios.isAxiosError(error) &&
    (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT")
  );
}

function parseRetryAfter(value: string | undefined): number {
  const seconds = Number.parseInt(value ?? "", 10);
  return Number.isFinite(seconds) && seconds >= 0
    ? seconds
    : DEFAULT_RETRY_AFTER_SECONDS;
}

function flattenHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    flat[key.toLowerCase()] = Array.isArray(value)
      ? value.join(", ")
      : String(value);
  }
  return flat;
}

// axios already parsed JSON bodies; whatever is still a string was not JSON.
function normalizeBody(data: unknown): unknown {
  if (typeof data === "string") {
    return { rawResponse: data };
  }
  return data ?? null;
}
