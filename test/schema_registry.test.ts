import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { createRegistry, SchemaRegistry } from "../src/schema/registry.js";
import { MANIFEST_SCHEMA_VERSION } from "../src/artifact-writer/manifest-builder.js";
import { makeTmpDir } from "./fakes.js";

describe("SchemaRegistry", () => {
  it("discovers the bundled schemas", () => {
    expect(createRegistry().names()).toEqual(["config", "run-manifest"]);
  });

  it("reads the version from the schema id", () => {
    const registry = createRegistry();
    expect(registry.version("config")).toBe("1.0.0");
    expect(registry.version("run-manifest")).toBe(MANIFEST_SCHEMA_VERSION);
  });

  it("reports why data is rejected", () => {
    const registry = createRegistry();
    const res = registry.validate("config", { schema_version: "1.0.0", output_dir: "x" });
    expect(res.valid).toBe(false);
    expect(res.errors).toBe("data must have required property 'repetitions'");
  });

  it("returns no errors for valid data", () => {
    const res = createRegistry().validate("config", { schema_version: "1.0.0", output_dir: "x", repetitions: 1 });
    expect(res).toEqual({ valid: true, errors: null });
  });

  it("fails on an unknown schema", () => {
    expect(() => createRegistry().validator("nope")).toThrow("Schema not found: nope");
  });

  describe("with a custom directory", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = makeTmpDir("flicker-schema-");
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("defaults the version when the id carries none", () => {
      fs.writeFileSync(path.join(tmpDir, "point.schema.json"), JSON.stringify({ type: "object" }));
      fs.writeFileSync(path.join(tmpDir, "notes.txt"), "ignored");

      const registry = createRegistry(tmpDir);

      expect(registry.names()).toEqual(["point"]);
      expect(registry.version("point")).toBe("1.0.0");
    });

    it("fails when the directory is missing", () => {
      expect(() => new SchemaRegistry(path.join(tmpDir, "gone")).load()).toThrow("Schema directory not found");
    });
  });
});
