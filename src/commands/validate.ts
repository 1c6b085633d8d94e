import fs from "node:fs";
import path from "node:path";
import { loadRawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { diag, type Diagnostic } from "./diagnostic.js";
import { toError } from "../core/errors.js";

export type ValidateResult = { ok: true } | { ok: false; errors: Diagnostic[] };

/** Check that the layered config loads and matches the config schema. */
export async function validateAll(opts: {
  configDir: string;
  envName?: string;
  schemaDir?: string;
}): Promise<ValidateResult> {
  const configDir = path.resolve(opts.configDir);

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }

  const basePath = path.join(configDir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    return {
      ok: false,
      errors: [diag("error", "CONFIG_BASE_MISSING", `Missing base config: ${basePath}`, { path: basePath })],
    };
  }

  const errors: Diagnostic[] = [];
  if (opts.envName) {
    const envPath = path.join(configDir, `${opts.envName}.yaml`);
    if (!fs.existsSync(envPath)) {
      errors.push(diag("error", "CONFIG_ENV_MISSING", `Missing environment config: ${envPath}`, { path: envPath }));
    }
  }

  let raw: Record<string, unknown>;
  try {
    raw = loadRawConfig(opts.envName, configDir);
  } catch (e) {
    errors.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${toError(e).message}`, { path: configDir }));
    return { ok: false, errors };
  }

  const { valid, errors: schemaErrors } = await validateConfig(raw, opts.schemaDir);
  if (!valid) {
    errors.push(diag("error", "CONFIG_INVALID", `Config invalid: ${schemaErrors}`, { path: configDir }));
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true };
}
