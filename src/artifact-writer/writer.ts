import fs from "node:fs";
import path from "node:path";
import { sha256Hex } from "./checksum.js";
import { buildManifest, manifestFileName, traceFileName } from "./manifest-builder.js";
import type { ManifestArtifact, RunManifest } from "../types/manifest.js";
import type { Run, Trace, TraceArtifact } from "../types/trace.js";

export type WriteTraceInput = {
  run: number;
  /** Null for the full-run trace. */
  tag: string | null;
  monitor: string;
  fileSuffix: string;
  trace: Trace;
};

/**
 * Manages the output directory of one execution.
 * Writes individual traces and generates the run manifest.
 */
export class TraceArtifactWriter {
  private artifacts: ManifestArtifact[] = [];

  constructor(
    private readonly outputDir: string,
    private readonly testName: string,
  ) {}

  /** Ensure the output directory exists. */
  init(): void {
    fs.mkdirSync(this.outputDir, { recursive: true });
  }

  /** Write a single trace file and track it. */
  writeTrace(input: WriteTraceInput): TraceArtifact {
    const fileName = traceFileName(this.testName, input.run, input.tag, input.fileSuffix);
    const fullPath = path.join(this.outputDir, fileName);

    const json = JSON.stringify(input.trace, null, 2);
    fs.writeFileSync(fullPath, json, "utf8");
    const sha256 = sha256Hex(json);

    this.artifacts.push({
      path: fileName,
      monitor: input.monitor,
      run: input.run,
      tag: input.tag,
      sha256,
      bytes: Buffer.byteLength(json, "utf8"),
    });

    // Handed to assertion predicates: frozen.
    const trace: Trace = Object.freeze({
      monitor: input.trace.monitor,
      entries: Object.freeze(input.trace.entries.map((entry) => Object.freeze({ ...entry }))),
    });
    return { monitor: input.monitor, path: fullPath, sha256, trace };
  }

  /** Generate and write the manifest file. Returns the manifest. */
  writeManifest(opts: { repetitions: number; runs: readonly Run[]; error: Error | null }): RunManifest {
    const manifest = buildManifest({
      testName: this.testName,
      repetitions: opts.repetitions,
      runs: opts.runs,
      artifacts: this.artifacts,
      error: opts.error,
    });

    fs.writeFileSync(this.getManifestPath(), JSON.stringify(manifest, null, 2), "utf8");
    return manifest;
  }

  getManifestPath(): string {
    return path.join(this.outputDir, manifestFileName(this.testName));
  }

  /** Get all tracked artifacts. */
  getArtifacts(): ManifestArtifact[] {
    return [...this.artifacts];
  }
}
