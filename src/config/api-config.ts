import dotenv from "dotenv";
import {
  type Credentials,
  type Environment,
  ENVIRONMENTS,
  type HttpMethod,
  validateApiConfig,
} from "../types";
import { ConfigurationError, WritePermissionError } from "./errors";

export const DEFAULT_BASE_URL = "https://api.feature.fm";
export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_RETRY_COUNT = 3;

export interface ApiConfigOptions {
  environment: Environment;
  apiKey: string;
  secretKey?: string;
  iss?: string;
  baseUrl: string;
  timeoutMs: number;
  retryCount: number;
}

/** Values passed on the command line; they win over the environment. */
export interface ConfigOverrides {
  apiKey?: string;
  secretKey?: string;
  iss?: string;
  baseUrl?: string;
}

export type EnvSource = Record<string, string | undefined>;

export class ApiConfig {
  readonly environment: Environment;
  readonly apiKey: string;
  readonly secretKey?: string;
  readonly iss?: string;
  readonly baseUrl: string;
  readonly manageBase: string;
  readonly marketingBase: string;
  readonly timeoutMs: number;
  readonly retryCount: number;

  constructor(options: ApiConfigOptions) {
    const validation = validateApiConfig(options);
    if (!validation.isValid) {
      throw new ConfigurationError(
        `Invalid ${options.environment} configuration: ${validation.errors.join("; ")}`,
        { environment: options.environment }
      );
    }

    this.environment = options.environment;
    this.apiKey = options.apiKey.trim();
    this.secretKey = options.secretKey;
    this.iss = options.iss;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.manageBase = `${this.baseUrl}/manage/v1`;
    this.marketingBase = `${this.baseUrl}/v2`;
    this.timeoutMs = options.timeoutMs;
    this.retryCount = options.retryCount;
  }

  get credentials(): Credentials {
    return { apiKey: this.apiKey, secretKey: this.secretKey, iss: this.iss };
  }

  canWrite(): boolean {
    return this.environment === "sandbox";
  }

  getEnvName(): string {
    return this.environment === "sandbox" ? "Sandbox" : "Production";
  }

  maskedApiKey(): string {
    return this.apiKey.length > 8 ? `${this.apiKey.slice(0, 8)}...` : this.apiKey;
  }

  requireWritePermission(operation: string): void {
    if (!this.canWrite()) {
      throw new WritePermissionError(
        `Write operation '${operation}' is not permitted in the ${this.getEnvName()} environment`,
        { environment: this.environment, operation }
      );
    }
  }

  /**
   * Capability guard evaluated before every request: reads are always
   * allowed, any other verb needs a writable environment.
   */
  assertMethodAllowed(method: HttpMethod, target: string): void {
    if (method === "GET" || this.canWrite()) return;
    throw new WritePermissionError(
      `${method} ${target} blocked: write operations are disabled in the ${this.getEnvName()} environment`,
      { environment: this.environment, method, target }
    );
  }
}

function readEnvironment(): EnvSource {
  dotenv.config();
  return process.env;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseInteger(value: string | undefined, fallback: number): number {
  const raw = nonEmpty(value);
  return raw === undefined ? fallback : Number(raw);
}

/**
 * Builds the configuration for one environment. Lookup order for every value:
 * CLI override, FEATUREFM_<ENV>_<NAME>, FEATUREFM_<NAME>.
 */
export function loadConfig(
  environment: Environment,
  overrides: ConfigOverrides = {},
  env: EnvSource = readEnvironment()
): ApiConfig {
  const prefix = `FEATUREFM_${environment.toUpperCase()}_`;
  const pick = (name: string): string | undefined =>
    nonEmpty(env[`${prefix}${name}`]) ?? nonEmpty(env[`FEATUREFM_${name}`]);

  const apiKey = nonEmpty(overrides.apiKey) ?? pick("API_KEY");
  if (!apiKey) {
    throw new ConfigurationError(
      `Missing API key for the ${environment} environment. Set ${prefix}API_KEY or FEATUREFM_API_KEY, or pass --api-key`,
      { environment }
    );
  }

  return new ApiConfig({
    environment,
    apiKey,
    secretKey: nonEmpty(overrides.secretKey) ?? pick("SECRET_KEY"),
    iss: nonEmpty(overrides.iss) ?? pick("ISS"),
    baseUrl: nonEmpty(overrides.baseUrl) ?? pick("BASE_URL") ?? DEFAULT_BASE_URL,
    timeoutMs: parseInteger(pick("TIMEOUT_MS"), DEFAULT_TIMEOUT_MS),
    retryCount: parseInteger(pick("RETRY_COUNT"), DEFAULT_RETRY_COUNT),
  });
}

export interface EnvironmentReport {
  environment: Environment;
  configured: boolean;
  apiKey: string | null;
  hasSecret: boolean;
  iss: string | null;
  baseUrl: string | null;
  error?: string;
}

export function describeConfiguration(
  env: EnvSource = readEnvironment()
): EnvironmentReport[] {
  return ENVIRONMENTS.map((environment) => {
    try {
      const config = loadConfig(environment, {}, env);
      return {
        environment,
        configured: true,
        apiKey: config.maskedApiKey(),
        hasSecret: config.secretKey !== undefined,
        iss: config.iss ?? null,
        baseUrl: config.baseUrl,
      };
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      return {
        environment,
        configured: false,
        apiKey: null,
        hasSecret: false,
        iss: null,
        baseUrl: null,
        error: error.message,
      };
    }
  });
}
