/** Layered harness configuration. */
export type ReportFormat = "human" | "jsonl";

export type HarnessConfig = {
  schema_version: string;
  output_dir: string;
  repetitions: number;
  exclude_janky_runs?: boolean;
  keep_artifacts?: boolean;
  report_format?: ReportFormat;
};
