import path from "node:path";
import { artifactFromDescriptor, type Artifact } from "../artifacts/artifact.js";
import { SUPPORTED_HASH_ALGORITHMS } from "../artifacts/checksum.js";
import { ConfigError } from "../errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { Logger } from "../logger.js";
import type { ArtifactEntry, DescriptorBody, ImageDescriptor, ModuleDescriptor } from "../types/descriptor.js";
import { loadDescriptor } from "./loader.js";
import type { SubstitutionContext } from "./substitution.js";

/** Keys that describe the module itself and never flow into the image. */
const MODULE_IDENTITY_KEYS = new Set(["name", "version", "description"]);

export const MODULE_DESCRIPTOR_FILE = "module.yaml";

/**
 * Merge a root image descriptor with its module descriptors.
 *
 * Modules apply in the given order, each overriding earlier modules; the root
 * overrides every module. `artifacts` and `repositories` are unioned instead,
 * root entries first. Artifacts are keyed by the file name they are saved
 * under: a repeated identical entry is dropped, a different one sharing the
 * name is a ConfigError.
 */
export function compose(root: ImageDescriptor, modules: ModuleDescriptor[]): ImageDescriptor {
  let layered: Partial<DescriptorBody> = {};
  for (const mod of modules) {
    layered = { ...layered, ...moduleContribution(mod) };
  }

  const effective: ImageDescriptor = { ...layered, ...root };

  const artifacts = unionArtifacts([root.artifacts ?? [], ...modules.map((m) => m.artifacts ?? [])]);
  if (artifacts.length > 0) effective.artifacts = artifacts;

  const repositories = unionStrings([root.repositories ?? [], ...modules.map((m) => m.repositories ?? [])]);
  if (repositories.length > 0) effective.repositories = repositories;

  return effective;
}

function moduleContribution(mod: ModuleDescriptor): Partial<DescriptorBody> {
  const out: Partial<DescriptorBody> = {};
  for (const [key, value] of Object.entries(mod)) {
    if (MODULE_IDENTITY_KEYS.has(key) || value === undefined) continue;
    Object.assign(out, { [key]: value });
  }
  return out;
}

function unionArtifacts(groups: ArtifactEntry[][]): ArtifactEntry[] {
  const seen = new Map<string, Artifact>();
  const out: ArtifactEntry[] = [];
  for (const entry of groups.flat()) {
    const artifact = artifactFromDescriptor(entry);
    if (artifact.name === "." || artifact.name === "..") {
      throw new ConfigError(`Artifact '${entry.artifact}' has no usable file name.`, ["Set an explicit 'name' for the artifact."]);
    }
    const first = seen.get(artifact.name);
    if (first === undefined) {
      seen.set(artifact.name, artifact);
      out.push(entry);
      continue;
    }
    if (!sameArtifact(first, artifact)) {
      throw new ConfigError(`Artifacts '${first.source}' and '${artifact.source}' are both saved as '${artifact.name}'.`, [
        "Give one of them a distinct 'name'.",
      ]);
    }
  }
  return out;
}

function sameArtifact(a: Artifact, b: Artifact): boolean {
  return a.source === b.source && SUPPORTED_HASH_ALGORITHMS.every((algorithm) => a.sums[algorithm] === b.sums[algorithm]);
}

function unionStrings(groups: string[][]): string[] {
  return [...new Set(groups.flat())];
}

/** Path of a named module descriptor under the modules search path. */
export function modulePath(modulesPath: string, name: string): string {
  return path.join(modulesPath, name, MODULE_DESCRIPTOR_FILE);
}

/** Load every module the root descriptor references, in declared order. */
export async function loadModules(
  root: ImageDescriptor,
  opts: { modulesPath: string; substitution?: SubstitutionContext; registry?: SchemaRegistry; logger?: Logger },
): Promise<Array<{ name: string; dir: string; descriptor: ModuleDescriptor }>> {
  const loaded: Array<{ name: string; dir: string; descriptor: ModuleDescriptor }> = [];

  for (const name of root.modules ?? []) {
    if (name.includes("/") || name.includes("\\") || name.includes("..")) {
      throw new ConfigError(`Invalid module name: ${name}`);
    }
    const file = modulePath(opts.modulesPath, name);
    const descriptor = await loadDescriptor(file, "module", {
      substitution: opts.substitution,
      registry: opts.registry,
      logger: opts.logger,
    });
    loaded.push({ name, dir: path.dirname(file), descriptor });
  }

  return loaded;
}
