import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

/** Compiled validator; a passing call narrows `data` to `T`. */
export type Validator<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type SchemaCompiler = {
  compile: <T>(schema: unknown) => Validator<T>;
  errorsText: (errors: unknown) => string;
};

/** Draft 2020-12 compiler in strict mode, with `date-time` and friends. */
export function createCompiler(): SchemaCompiler {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): SchemaCompiler };
  const add = addFormats as unknown as (ajv: SchemaCompiler) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);
  return ajv;
}
