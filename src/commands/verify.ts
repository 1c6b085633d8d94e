import fs from "node:fs";
import path from "node:path";
import { sha256OfFile } from "../artifact-writer/checksum.js";
import { readManifest } from "../artifact-writer/manifest-reader.js";
import { diag, type Diagnostic } from "./diagnostic.js";

export type VerifyResult = { ok: boolean; diagnostics: Diagnostic[] };

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/**
 * Check a run manifest against its schema and every listed trace against its
 * recorded size and sha256. Traces removed by cleanup are warnings, not
 * errors.
 */
export async function verifyArtifacts(opts: {
  outputDir: string;
  testName: string;
  schemaDir?: string;
}): Promise<VerifyResult> {
  const outputDir = path.resolve(opts.outputDir);
  const res = await readManifest(outputDir, opts.testName, opts.schemaDir);
  if (!res.ok) {
    return { ok: false, diagnostics: [diag("error", res.code, res.message, { path: res.path })] };
  }

  const diagnostics: Diagnostic[] = [];
  for (const entry of res.manifest.artifacts) {
    const target = path.resolve(outputDir, entry.path);
    if (!isWithinDir(outputDir, target)) {
      diagnostics.push(
        diag("error", "ARTIFACT_PATH_ESCAPES_DIR", `Manifest path escapes output dir: ${entry.path}`, { path: entry.path }),
      );
      continue;
    }
    if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
      diagnostics.push(diag("warn", "ARTIFACT_MISSING", `Trace not on disk (cleaned up?): ${entry.path}`, { path: target }));
      continue;
    }

    const size = fs.statSync(target).size;
    if (size !== entry.bytes) {
      diagnostics.push(
        diag("error", "ARTIFACT_SIZE_MISMATCH", `Trace size mismatch (${entry.path}): manifest=${entry.bytes} actual=${size}`, {
          path: target,
          details: { expectedBytes: entry.bytes, actualBytes: size },
        }),
      );
    }

    const actualHash = sha256OfFile(target);
    if (actualHash !== entry.sha256) {
      diagnostics.push(
        diag("error", "ARTIFACT_SHA256_MISMATCH", `Trace sha256 mismatch (${entry.path}): manifest=${entry.sha256} actual=${actualHash}`, {
          path: target,
          details: { expectedSha256: entry.sha256, actualSha256: actualHash },
        }),
      );
    }
  }

  return { ok: !diagnostics.some((d) => d.level === "error"), diagnostics };
}
