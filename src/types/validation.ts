import Joi from "joi";
import type { ValidationResult } from "./common";
import type { RunResults } from "./test-result";

// Resolved configuration schema
export const apiConfigSchema = Joi.object({
  environment: Joi.string().valid("sandbox", "production").required(),
  apiKey: Joi.string().trim().required(),
  secretKey: Joi.string().optional(),
  iss: Joi.string().optional(),
  baseUrl: Joi.string()
    .uri({ scheme: ["http", "https"] })
    .required(),
  timeoutMs: Joi.number().integer().positive().required(),
  retryCount: Joi.number().integer().min(1).max(10).required(),
});

const idSchema = Joi.alternatives().try(Joi.string(), Joi.number());

export type ResponseShape =
  | "artist"
  | "artistList"
  | "resourceList"
  | "createdResource"
  | "record";

// Response shape schemas. The API adds fields freely, so unknown keys pass.
const responseShapes: Record<ResponseShape, Joi.Schema> = {
  artist: Joi.object({
    id: idSchema.optional(),
    artistName: Joi.string().optional(),
    type: Joi.string().optional(),
    countryCode: Joi.string().optional(),
  }).unknown(true),
  artistList: Joi.array().items(
    Joi.object({
      id: idSchema.optional(),
      artistName: Joi.string().optional(),
    }).unknown(true)
  ),
  resourceList: Joi.array(),
  createdResource: Joi.object({
    id: idSchema.required(),
  }).unknown(true),
  record: Joi.object().unknown(true),
};

const testRecordSchema = Joi.object({
  status: Joi.string().valid("PASSED", "FAILED", "SKIPPED", "WARNING").required(),
  timestamp: Joi.string().isoDate().required(),
  details: Joi.object().unknown(true).required(),
});

const runResultsSchema = Joi.object({
  timestamp: Joi.string().isoDate().required(),
  environment: Joi.string().valid("sandbox", "production").required(),
  credentials: Joi.object({
    apiKey: Joi.string().required(),
    iss: Joi.string().allow(null).required(),
  }).required(),
  endpointsTested: Joi.array().items(Joi.string()).required(),
  tests: Joi.object().pattern(Joi.string(), testRecordSchema).required(),
  summary: Joi.object({
    total: Joi.number().integer().min(0).required(),
    passed: Joi.number().integer().min(0).required(),
    failed: Joi.number().integer().min(0).required(),
    skipped: Joi.number().integer().min(0).required(),
    warnings: Joi.number().integer().min(0).required(),
  }).required(),
  errors: Joi.array()
    .items(Joi.object({ test: Joi.string().required(), error: Joi.any() }))
    .required(),
  resources: Joi.object()
    .pattern(Joi.string(), Joi.array().items(Joi.string()))
    .required(),
})
  .custom((value: RunResults, helpers) => {
    const entries = Object.keys(value.tests).length;
    if (entries !== value.summary.total) {
      return helpers.error("custom.summaryMismatch", {
        entries,
        total: value.summary.total,
      });
    }
    return value;
  }, "Summary consistency validation")
  .messages({
    "custom.summaryMismatch":
      "Summary total {{#total}} does not match {{#entries}} recorded tests",
  });

function toValidationResult(error: Joi.ValidationError | undefined): ValidationResult {
  return {
    isValid: !error,
    errors: error ? error.details.map((detail) => detail.message) : [],
    warnings: [],
  };
}

/**
 * Validates a response body against one of the known response shapes
 */
export function validateResponseShape(
  shape: ResponseShape,
  data: unknown
): ValidationResult {
  const result = responseShapes[shape].validate(data, { abortEarly: false });
  return toValidationResult(result.error);
}

export function validateApiConfig(config: unknown): ValidationResult {
  const result = apiConfigSchema.validate(config, { abortEarly: false });
  return toValidationResult(result.error);
}

export function validateRunResults(results: unknown): ValidationResult {
  const result = runResultsSchema.validate(results, { abortEarly: false });
  return toValidationResult(result.error);
}
