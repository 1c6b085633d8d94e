import type { HarnessConfig } from "../types/config.js";
import { ConfigError } from "../core/errors.js";
import { createRegistry } from "../schema/registry.js";

export type ConfigValidationResult = {
  valid: boolean;
  errors: string | null;
};

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown, schemaDir?: string): Promise<ConfigValidationResult> {
  return createRegistry(schemaDir).validate("config", config);
}

/** @throws ConfigError If `raw` does not match the config schema */
export async function parseConfig(raw: unknown, schemaDir?: string): Promise<HarnessConfig> {
  const registry = createRegistry(schemaDir);
  const isConfig = registry.validator<HarnessConfig>("config");
  if (!isConfig(raw)) {
    throw new ConfigError(`Config invalid: ${registry.errorsText("config")}`);
  }
  return raw;
}
