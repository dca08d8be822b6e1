import fs from "node:fs";
import YAML from "yaml";
import { ConfigError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { ImageDescriptor, ModuleDescriptor, SchemaType } from "../types/descriptor.js";
import { substitute, type SubstitutionContext } from "./substitution.js";

export type LoadOptions = {
  /** When given, placeholders are resolved in the raw text before parsing. */
  substitution?: SubstitutionContext;
  registry?: SchemaRegistry;
  logger?: Logger;
};

type DescriptorFor<T extends SchemaType> = T extends "image" ? ImageDescriptor : ModuleDescriptor;

/**
 * Load a descriptor and validate it against the schema of `schemaType`.
 *
 * Order: schema lookup, descriptor lookup, placeholder substitution, YAML parse,
 * schema validation (which also coerces scalars to the declared types).
 */
export async function loadDescriptor<T extends SchemaType>(
  descriptorPath: string,
  schemaType: T,
  opts: LoadOptions = {},
): Promise<DescriptorFor<T>> {
  const logger = opts.logger ?? silentLogger;
  logger.debug(`Loading ${schemaType} descriptor from path '${descriptorPath}'.`);

  const registry = opts.registry ?? (await createRegistry());
  if (!registry.has(schemaType)) {
    throw new ConfigError(`Cannot locate schema for ${schemaType}.`);
  }

  if (!fs.existsSync(descriptorPath) || !fs.statSync(descriptorPath).isFile()) {
    throw new ConfigError(`Cannot find descriptor file: ${descriptorPath}`, [
      "Verify the descriptor path, or the modules path for module descriptors.",
    ]);
  }

  let raw = fs.readFileSync(descriptorPath, "utf8");
  if (opts.substitution) {
    raw = substitute(raw, opts.substitution);
  }

  let data: unknown;
  try {
    data = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`Cannot parse ${schemaType} descriptor ${descriptorPath}: ${errorMessage(e)}`);
  }

  const { valid, errors } = await registry.validate(schemaType, data);
  if (!valid || !isDescriptor<T>(data)) {
    throw new ConfigError(`Cannot validate ${schemaType} descriptor ${descriptorPath}: ${errors ?? "not a mapping"}`);
  }

  return data;
}

// Narrowing after schema validation; the schema is the real check.
function isDescriptor<T extends SchemaType>(data: unknown): data is DescriptorFor<T> {
  return typeof data === "object" && data !== null && !Array.isArray(data);
}
