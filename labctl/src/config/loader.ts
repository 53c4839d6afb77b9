import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { LabConfig } from "../types/config.js";
import { ConfigError } from "../core/errors.js";
import { validateConfig } from "./validator.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");
const ENV_PREFIX = "LABCTL_";

type ConfigTree = Record<string, unknown>;

function isTree(val: unknown): val is ConfigTree {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isTree(val)) {
      const current = result[key];
      result[key] = deepMerge(isTree(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed == null) return {};
  if (!isTree(parsed)) {
    throw new ConfigError(`Config file must hold a mapping: ${filePath}`, { operation: "load_config" });
  }
  return parsed;
}

/**
 * Apply LABCTL_ prefixed environment variable overrides.
 * LABCTL_STATE_DIR → state_dir; a double underscore nests: LABCTL_LIFECYCLE__MAX_RETRIES → lifecycle.max_retries.
 * Values are read as YAML scalars, so "5" is a number and "null" is null.
 */
function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv): ConfigTree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const parts = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    if (parts[0] === "log_level") continue;

    let patch: ConfigTree = { [parts[parts.length - 1]]: parseScalar(value) };
    for (let i = parts.length - 2; i >= 0; i--) {
      patch = { [parts[i]]: patch };
    }
    result = deepMerge(result, patch);
  }
  return result;
}

function parseScalar(value: string): unknown {
  try {
    const parsed: unknown = YAML.parse(value);
    return isTree(parsed) || Array.isArray(parsed) ? value : parsed;
  } catch {
    return value;
  }
}

/** Merge the config layers without validating them. */
export function loadRawConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const dir = configDir ?? CONFIG_DIR;

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, env);
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← LABCTL_* environment variables.
 * Throws ConfigError when the merged result does not match the config schema.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): LabConfig {
  const raw = loadRawConfig(envName, configDir, env);
  const check = validateConfig(raw);
  if (!check.valid) {
    throw new ConfigError(`Invalid config: ${check.errors}`, { operation: "load_config" });
  }
  return check.config;
}
