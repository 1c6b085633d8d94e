import fs from "node:fs";
import path from "node:path";
import { readManifest } from "../artifact-writer/manifest-reader.js";

export type ArtifactListing = {
  path: string;
  monitor: string;
  run: number;
  tag: string | null;
  bytes: number;
  /** False once `cleanUp` removed the file. */
  present: boolean;
};

export type ArtifactsResult =
  | { ok: true; files: ArtifactListing[] }
  | { ok: false; error: string };

/**
 * List the trace artifacts recorded in a test's run manifest.
 */
export async function listArtifacts(opts: { outputDir: string; testName: string }): Promise<ArtifactsResult> {
  const res = await readManifest(opts.outputDir, opts.testName);
  if (!res.ok) {
    return { ok: false, error: res.message };
  }

  const files = res.manifest.artifacts.map((a) => ({
    path: a.path,
    monitor: a.monitor,
    run: a.run,
    tag: a.tag,
    bytes: a.bytes,
    present: fs.existsSync(path.join(opts.outputDir, a.path)),
  }));

  return { ok: true, files };
}
