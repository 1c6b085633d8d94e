/** Run manifest, written next to the traces after each execution. */
export type ManifestArtifact = {
  /** Path relative to the output directory. */
  path: string;
  monitor: string;
  run: number;
  tag: string | null;
  sha256: string;
  bytes: number;
};

export type ManifestRun = {
  index: number;
  janky_frames: number | null;
  error: string | null;
};

export type RunManifest = {
  schema_version: string;
  test_name: string;
  created_at: string;
  repetitions: number;
  runs: ManifestRun[];
  artifacts: ManifestArtifact[];
  error: string | null;
};
