import type { ManifestArtifact, ManifestRun, RunManifest } from "../types/manifest.js";
import type { Run } from "../types/trace.js";

export const MANIFEST_SCHEMA_VERSION = "1.0.0";

/** `{testName}_manifest.json` */
export function manifestFileName(testName: string): string {
  return `${testName}_manifest.json`;
}

/** `{testName}_{run}[_{tag}]{suffix}` */
export function traceFileName(testName: string, run: number, tag: string | null, suffix: string): string {
  const base = tag === null ? `${testName}_${run}` : `${testName}_${run}_${tag}`;
  return base + suffix;
}

export type ManifestBuildInput = {
  testName: string;
  repetitions: number;
  runs: readonly Run[];
  artifacts: ManifestArtifact[];
  error: Error | null;
};

/** Build a complete manifest from the given inputs. */
export function buildManifest(input: ManifestBuildInput): RunManifest {
  const runs: ManifestRun[] = input.runs.map((run) => ({
    index: run.index,
    janky_frames: run.jankyFrames,
    error: run.error?.message ?? null,
  }));

  return {
    schema_version: MANIFEST_SCHEMA_VERSION,
    test_name: input.testName,
    created_at: new Date().toISOString(),
    repetitions: input.repetitions,
    runs,
    artifacts: input.artifacts,
    error: input.error?.message ?? null,
  };
}
