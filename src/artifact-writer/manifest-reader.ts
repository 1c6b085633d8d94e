import fs from "node:fs";
import path from "node:path";
import type { RunManifest } from "../types/manifest.js";
import { createRegistry } from "../schema/registry.js";
import { manifestFileName } from "./manifest-builder.js";
import { toError } from "../core/errors.js";

export type ManifestReadResult =
  | { ok: true; manifest: RunManifest; path: string }
  | { ok: false; code: "MANIFEST_MISSING" | "MANIFEST_JSON_INVALID" | "MANIFEST_INVALID"; message: string; path: string };

/** Read `{testName}_manifest.json` and check it against the run-manifest schema. */
export async function readManifest(outputDir: string, testName: string, schemaDir?: string): Promise<ManifestReadResult> {
  const manifestPath = path.join(outputDir, manifestFileName(testName));
  if (!fs.existsSync(manifestPath)) {
    return { ok: false, code: "MANIFEST_MISSING", message: `Missing run manifest: ${manifestPath}`, path: manifestPath };
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
  } catch (e) {
    return {
      ok: false,
      code: "MANIFEST_JSON_INVALID",
      message: `Invalid JSON manifest (${manifestPath}): ${toError(e).message}`,
      path: manifestPath,
    };
  }

  const registry = createRegistry(schemaDir);
  const isManifest = registry.validator<RunManifest>("run-manifest");
  if (!isManifest(data)) {
    return {
      ok: false,
      code: "MANIFEST_INVALID",
      message: `Run manifest invalid (${manifestPath}): ${registry.errorsText("run-manifest")}`,
      path: manifestPath,
    };
  }

  return { ok: true, manifest: data, path: manifestPath };
}
