import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { PublishConfig } from "../types/config.js";

export const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "qualifier",
    "bootstrap_name",
    "framework_import",
    "exclude",
    "timeouts",
    "compiler",
    "aws",
  ],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    qualifier: { type: "string", minLength: 1 },
    bootstrap_name: { type: "string", minLength: 1, pattern: "^[^/\\\\]+$" },
    framework_import: { type: "string", minLength: 1 },
    exclude: { type: "array", items: { type: "string", minLength: 1 } },
    timeouts: {
      type: "object",
      required: ["fetch_seconds", "update_seconds"],
      additionalProperties: false,
      properties: {
        fetch_seconds: { type: "number", exclusiveMinimum: 0 },
        update_seconds: { type: "number", exclusiveMinimum: 0 },
      },
    },
    compiler: {
      type: "object",
      required: ["command", "env"],
      additionalProperties: false,
      properties: {
        command: { type: "string", minLength: 1 },
        env: { type: "object", additionalProperties: { type: "string" } },
      },
    },
    aws: {
      type: "object",
      additionalProperties: false,
      properties: {
        region: { type: "string", minLength: 1 },
        endpoint_url: { type: "string", format: "uri" },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: PublishConfig; errors: null }
  | { valid: false; errors: string };

let validate: AjvValidateFn<PublishConfig> | null = null;

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  validate ??= ajv.compile<PublishConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors, { dataVar: "config" }) };
}
