import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown, opts?: { dataVar?: string }) => string;
};

let shared: AjvInstance | null = null;

/** Draft 2020-12 validator with format support, created once per process. */
export function loadAjv(): AjvInstance {
  if (shared) return shared;

  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance, formats: string[]) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv, ["uri"]);

  shared = ajv;
  return ajv;
}
