import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { PublishConfig } from "../types/config.js";
import { CONFIG_SCHEMA, validateConfig } from "./validator.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "LAMBDA_PUBLISH_";

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isTree(val)) {
      result[key] = deepMerge(isTree(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Map env var segments onto config keys by walking the schema. Declared
 * properties are lower-case; keys of free-form maps (compiler.env) keep
 * their case. The value becomes a number only where the schema wants one.
 */
function resolveOverride(rawSegments: string[], value: string): { keys: string[]; value: string | number } {
  let schema: unknown = CONFIG_SCHEMA;
  const keys: string[] = [];
  for (const raw of rawSegments) {
    const lower = raw.toLowerCase();
    const props = isTree(schema) ? schema.properties : undefined;
    const additional = isTree(schema) ? schema.additionalProperties : undefined;
    if (isTree(props) && lower in props) {
      keys.push(lower);
      schema = props[lower];
    } else if (isTree(additional)) {
      keys.push(raw);
      schema = additional;
    } else {
      keys.push(lower);
      schema = undefined;
    }
  }
  const numeric = isTree(schema) && schema.type === "number" && /^\d+(\.\d+)?$/.test(value);
  return { keys, value: numeric ? Number(value) : value };
}

/**
 * Apply LAMBDA_PUBLISH_ prefixed environment variable overrides.
 * A double underscore descends one level:
 * LAMBDA_PUBLISH_TIMEOUTS__FETCH_SECONDS=10 → timeouts.fetch_seconds = 10,
 * LAMBDA_PUBLISH_COMPILER__ENV__CGO_ENABLED=0 → compiler.env.CGO_ENABLED = "0".
 */
export function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  let result = config;
  for (const [key, raw] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || raw === undefined) continue;
    const { keys: segments, value } = resolveOverride(key.slice(ENV_PREFIX.length).split("__"), raw);
    let patch: ConfigTree = { [segments[segments.length - 1]]: value };
    for (let i = segments.length - 2; i >= 0; i--) {
      patch = { [segments[i]]: patch };
    }
    result = deepMerge(result, patch);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables,
 * then validate the result against the config schema.
 *
 * @param envName - Optional layer name (e.g. "local"), loaded from `{envName}.yaml`.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string): PublishConfig {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));

  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  merged = applyEnvOverrides(merged);

  const result = validateConfig(merged);
  if (!result.valid) {
    throw new Error(`Invalid configuration in ${dir}: ${result.errors}`);
  }
  return result.config;
}
