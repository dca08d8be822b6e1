import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown, opts?: { dataVar?: string }) => string;
};

/**
 * Ajv configured for descriptors and settings: strict schemas, every error
 * reported, and scalar coercion so `version: 1` or `IMAGEGEN_FETCH_TIMEOUT_MS=500`
 * land with the type the schema declares.
 */
export async function loadAjv(): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, allowUnionTypes: true, coerceTypes: true });
  add(ajv);

  return ajv;
}
