import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { HarnessConfig } from "../types/config.js";
import { parseConfig } from "./validator.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "FLICKER_";

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed object, or an empty object if not found. */
function loadYaml(filePath: string): ConfigRecord {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/** "3" → 3, "true" → true; anything else stays a string. */
function coerce(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^-?\d+$/.test(value)) return Number(value);
  return value;
}

/** Apply FLICKER_ prefixed environment variable overrides. */
function applyEnvOverrides(config: ConfigRecord, env: NodeJS.ProcessEnv): ConfigRecord {
  const result: ConfigRecord = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // FLICKER_OUTPUT_DIR → output_dir
    result[key.slice(ENV_PREFIX.length).toLowerCase()] = coerce(value);
  }
  return result;
}

/**
 * Load the layered config without validating it:
 * base.yaml ← {envName}.yaml ← environment variables.
 */
export function loadRawConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  return applyEnvOverrides(merged, env);
}

/**
 * Load and validate the layered config.
 *
 * @param envName - Optional environment name (e.g., "ci"). Loads
 *                  `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 * @throws ConfigError If the merged config does not match the config schema
 */
export async function loadConfig(envName?: string, configDir?: string): Promise<HarnessConfig> {
  return parseConfig(loadRawConfig(envName, configDir));
}
