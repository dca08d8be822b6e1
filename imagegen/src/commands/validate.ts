import fs from "node:fs";
import { loadDescriptor } from "../descriptor/loader.js";
import { listPlaceholders, parseParams, type Placeholder } from "../descriptor/substitution.js";
import { ConfigError, renderError } from "../errors.js";
import { createRegistry } from "../schema/registry.js";
import type { SchemaType } from "../types/descriptor.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult =
  | { ok: true; placeholders: Placeholder[] }
  | { ok: false; errors: Diagnostic[] };

function diag(level: Diagnostic["level"], code: string, message: string, filePath?: string): Diagnostic {
  return { level, code, message, path: filePath };
}

/**
 * Validate a descriptor without generating anything. Placeholders without an
 * inline default or override are reported instead of failing the load.
 */
export async function validateDescriptor(opts: {
  descriptor: string;
  type: SchemaType;
  params?: string[];
  schemaDir?: string;
}): Promise<ValidateResult> {
  if (!fs.existsSync(opts.descriptor)) {
    return { ok: false, errors: [diag("error", "DESCRIPTOR_MISSING", `Descriptor not found: ${opts.descriptor}`, opts.descriptor)] };
  }

  let overrides: Record<string, string>;
  try {
    overrides = parseParams(opts.params ?? []);
  } catch (e) {
    return { ok: false, errors: [diag("error", "PARAM_INVALID", renderError(e))] };
  }

  const placeholders = listPlaceholders(fs.readFileSync(opts.descriptor, "utf8"));
  const unresolved = placeholders.filter(
    (p) => p.default === undefined && !Object.prototype.hasOwnProperty.call(overrides, p.name),
  );
  if (unresolved.length > 0) {
    return {
      ok: false,
      errors: unresolved.map((p) =>
        diag("error", "PARAM_UNRESOLVED", `Parameter '${p.name}' has no default and no value was supplied`, opts.descriptor),
      ),
    };
  }

  try {
    await loadDescriptor(opts.descriptor, opts.type, {
      substitution: { overrides },
      registry: await createRegistry(opts.schemaDir),
    });
  } catch (e) {
    const code = e instanceof ConfigError ? "DESCRIPTOR_INVALID" : "DESCRIPTOR_READ_FAILED";
    return { ok: false, errors: [diag("error", code, renderError(e), opts.descriptor)] };
  }

  return { ok: true, placeholders };
}
