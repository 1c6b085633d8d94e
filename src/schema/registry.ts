import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createCompiler, type SchemaCompiler, type Validator } from "./ajv.js";

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

type SchemaEntry = {
  version: string;
  schema: unknown;
  validator: Validator<unknown> | null;
};

/**
 * Every `*.schema.json` of a directory, keyed by file stem
 * ("run-manifest.schema.json" → "run-manifest"). Validators compile on
 * first use.
 */
export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  private readonly compiler: SchemaCompiler = createCompiler();

  constructor(private readonly schemaDir: string) {}

  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    for (const file of fs.readdirSync(this.schemaDir).sort()) {
      if (!file.endsWith(".schema.json")) continue;
      const schema: unknown = JSON.parse(fs.readFileSync(path.join(this.schemaDir, file), "utf8"));
      this.entries.set(file.slice(0, -".schema.json".length), {
        version: versionOf(schema) ?? "1.0.0",
        schema,
        validator: null,
      });
    }
    return this;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /** Version declared in the schema's `$id`. */
  version(name: string): string {
    return this.entry(name).version;
  }

  /** Validator for `name`; narrows to `T`, which the caller vouches for. */
  validator<T>(name: string): Validator<T> {
    const entry = this.entry(name);
    entry.validator ??= this.compiler.compile<unknown>(entry.schema);
    const compiled = entry.validator;
    return (data: unknown): data is T => compiled(data);
  }

  validate(name: string, data: unknown): { valid: boolean; errors: string | null } {
    const valid = this.validator<unknown>(name)(data);
    return { valid, errors: valid ? null : this.errorsText(name) };
  }

  /** Readable text of the errors left by the last failed call on `name`. */
  errorsText(name: string): string {
    return this.compiler.errorsText(this.entry(name).validator?.errors);
  }

  private entry(name: string): SchemaEntry {
    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);
    return entry;
  }
}

/** `x.y.z` from a `$id` ending in `@x.y.z`. */
function versionOf(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null || !("$id" in schema)) return null;
  const id = schema.$id;
  if (typeof id !== "string") return null;
  const m = /@(\d+\.\d+\.\d+)$/.exec(id);
  return m ? m[1] : null;
}

export function createRegistry(schemaDir: string = SCHEMA_DIR): SchemaRegistry {
  return new SchemaRegistry(schemaDir).load();
}
