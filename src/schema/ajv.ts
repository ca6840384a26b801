import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown, opts?: { dataVar?: string; separator?: string }) => string;
};

/** Fresh ajv instance: draft 2020-12, all errors, strict, with formats. */
export async function loadAjv(): Promise<AjvInstance> {
  // ajv and ajv-formats are CommonJS; under NodeNext their default import is the module object type.
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, allowUnionTypes: true });
  add(ajv);

  return ajv;
}

/** Render ajv errors as "<path> <message>" joined by "; ". */
export function formatErrors(ajv: AjvInstance, errors: unknown, dataVar = "topology"): string {
  return ajv.errorsText(errors, { dataVar, separator: "; " });
}

/** Narrow with a compiled schema, the way ajv's own ValidateFunction<T> does. */
export function asGuard<T>(validate: AjvValidateFn): (data: unknown) => data is T {
  return (data: unknown): data is T => validate(data);
}
