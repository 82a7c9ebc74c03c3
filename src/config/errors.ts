import type { Environment, HttpMethod } from "../types";

export enum HarnessErrorType {
  CONFIGURATION = "CONFIGURATION",
  WRITE_PERMISSION = "WRITE_PERMISSION",
}

export interface HarnessErrorContext {
  environment?: Environment;
  operation?: string;
  method?: HttpMethod;
  target?: string;
  additionalInfo?: Record<string, unknown>;
}

export class HarnessError extends Error {
  public readonly type: HarnessErrorType;
  public readonly context: HarnessErrorContext;
  public readonly timestamp: Date;

  constructor(
    type: HarnessErrorType,
    message: string,
    context: HarnessErrorContext = {}
  ) {
    super(message);
    this.name = "HarnessError";
    this.type = type;
    this.context = context;
    this.timestamp = new Date();
  }

  toJSON() {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export class ConfigurationError extends HarnessError {
  constructor(message: string, context: HarnessErrorContext = {}) {
    super(HarnessErrorType.CONFIGURATION, message, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Raised when a write is attempted against an environment that only allows
 * reads. Always thrown before a request leaves the process.
 */
export class WritePermissionError extends HarnessError {
  constructor(message: string, context: HarnessErrorContext = {}) {
    super(HarnessErrorType.WRITE_PERMISSION, message, context);
    this.name = "WritePermissionError";
  }
}
