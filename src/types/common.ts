// Common types and enums

export type Environment = "sandbox" | "production";

export const ENVIRONMENTS: readonly Environment[] = ["sandbox", "production"];

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type TestStatus = "PASSED" | "FAILED" | "SKIPPED" | "WARNING";

export type StatusClass =
  | "success"
  | "client_error"
  | "server_error"
  | "network_error";

export type AuthMode = "api_key" | "jwt" | "hmac";

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface Credentials {
  apiKey: string;
  secretKey?: string;
  iss?: string;
}

export function isEnvironment(value: string): value is Environment {
  return value === "sandbox" || value === "production";
}

/**
 * Maps an HTTP status code onto the harness error taxonomy. Status 0 means
 * no response was received at all.
 */
export function classifyStatus(statusCode: number): StatusClass {
  if (statusCode <= 0) return "network_error";
  if (statusCode < 400) return "success";
  if (statusCode < 500) return "client_error";
  return "server_error";
}
