#!/usr/bin/env node

import { Command } from "commander";
import { loadConfig } from "./config/loader.js";
import { validateAll } from "./commands/validate.js";
import { run } from "./commands/run.js";
import { listArtifacts } from "./commands/artifacts.js";
import { verifyArtifacts } from "./commands/verify.js";
import { EXIT } from "./commands/exit-codes.js";
import { createReporter } from "./report/reporter.js";
import { toError } from "./core/errors.js";
import type { HarnessConfig, ReportFormat } from "./types/config.js";

function parseFormat(value: string): ReportFormat {
  if (value !== "human" && value !== "jsonl") {
    process.stderr.write(`Unknown format: ${value} (expected human|jsonl)\n`);
    process.exit(EXIT.INVALID_ARGS);
  }
  return value;
}

const program = new Command();

program
  .name("flickerctl")
  .description("Run transition tests and check their traces")
  .version("0.1.0");

program
  .command("validate")
  .description("Validate the layered config")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Environment override layer (config/<name>.yaml)")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { config: string; env?: string; format: string }) => {
    const reporter = createReporter(parseFormat(opts.format));
    const res = await validateAll({ configDir: opts.config, envName: opts.env });

    if (!res.ok) {
      for (const err of res.errors) reporter.report(err);
      process.exit(EXIT.INVALID_ARGS);
    }
    reporter.report({ level: "info", code: "OK", message: "OK" });
  });

program
  .command("run")
  .description("Execute a scenario module and check its assertions")
  .argument("<module>", "Module whose default export is a TransitionTest or a function returning one")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Environment override layer (config/<name>.yaml)")
  .option("--only-flaky", "Check only the flaky assertions")
  .option("--keep", "Keep the traces of passing runs")
  .option("--format <format>", "Output format: human|jsonl")
  .action(
    async (
      modulePath: string,
      opts: { config: string; env?: string; onlyFlaky?: boolean; keep?: boolean; format?: string },
    ) => {
      let config: HarnessConfig;
      try {
        config = await loadConfig(opts.env, opts.config);
      } catch (e) {
        process.stderr.write(toError(e).message + "\n");
        process.exit(EXIT.INVALID_ARGS);
      }

      const format = opts.format ? parseFormat(opts.format) : config.report_format ?? "human";
      const res = await run({
        modulePath,
        config,
        onlyFlaky: opts.onlyFlaky,
        keep: opts.keep,
        reporter: createReporter(format),
      });

      if (!res.ok) process.exit(res.exitCode);
    },
  );

program
  .command("artifacts")
  .description("List the traces recorded for a test")
  .argument("<outputDir>", "Output directory of the test")
  .argument("<testName>", "Test name")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (outputDir: string, testName: string, opts: { format: string }) => {
    const format = parseFormat(opts.format);
    const res = await listArtifacts({ outputDir, testName });
    if (!res.ok) {
      createReporter(format).report({ level: "error", code: "ARTIFACTS_UNAVAILABLE", message: res.error });
      process.exit(EXIT.INVALID_ARGS);
    }

    if (format === "jsonl") {
      for (const f of res.files) process.stdout.write(JSON.stringify(f) + "\n");
    } else {
      for (const f of res.files) {
        console.log(`${f.path}  ${f.bytes} bytes${f.present ? "" : "  (deleted)"}`);
      }
    }
  });

program
  .command("verify")
  .description("Check a test's run manifest and trace checksums")
  .argument("<outputDir>", "Output directory of the test")
  .argument("<testName>", "Test name")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (outputDir: string, testName: string, opts: { format: string }) => {
    const reporter = createReporter(parseFormat(opts.format));
    const res = await verifyArtifacts({ outputDir, testName });

    for (const d of res.diagnostics) reporter.report(d);
    if (!res.ok) process.exit(EXIT.EXECUTION_FAILED);
    reporter.report({ level: "info", code: "OK", message: "OK" });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
