import type { Environment, HttpMethod, TestStatus } from "./common";

export type JsonObject = { [key: string]: unknown };

export interface ApiResponse {
  statusCode: number;
  headers: Record<string, string>;
  data: unknown;
  url: string;
  method: HttpMethod;
  attempt: number;
  durationMs: number;
}

export interface RequestFailure {
  error: string;
  url: string;
  method: HttpMethod;
  statusCode?: number;
}

export type RequestOutcome =
  | { success: true; response: ApiResponse }
  | { success: false; response: ApiResponse }
  | { success: false; failure: RequestFailure };

/**
 * Whatever a test wants persisted next to its status: a raw response, a
 * transport failure or a short reason for skipping.
 */
export type TestDetails =
  | ApiResponse
  | RequestFailure
  | { reason: string }
  | { error: string };

export interface TestRecord {
  status: TestStatus;
  timestamp: string;
  details: TestDetails;
}

export interface RunSummary {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  warnings: number;
}

export interface ErrorEntry {
  test: string;
  error: unknown;
}

export interface MaskedCredentials {
  apiKey: string;
  iss: string | null;
}

export interface RunResults {
  timestamp: string;
  environment: Environment;
  credentials: MaskedCredentials;
  endpointsTested: string[];
  tests: Record<string, TestRecord>;
  summary: RunSummary;
  errors: ErrorEntry[];
  resources: Record<string, string[]>;
}
