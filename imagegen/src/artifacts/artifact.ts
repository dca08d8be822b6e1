import type { ArtifactEntry } from "../types/descriptor.js";
import { SUPPORTED_HASH_ALGORITHMS, type HashAlgorithm } from "./checksum.js";

export type Artifact = {
  source: string;
  name: string;
  sums: Partial<Record<HashAlgorithm, string>>;
};

/** Build an artifact from its descriptor entry; `name` defaults to the URL's last path segment. */
export function artifactFromDescriptor(entry: ArtifactEntry): Artifact {
  const sums: Partial<Record<HashAlgorithm, string>> = {};
  for (const algorithm of SUPPORTED_HASH_ALGORITHMS) {
    const value = entry[algorithm];
    if (typeof value === "string" && value.length > 0) {
      sums[algorithm] = value;
    }
  }

  return {
    source: entry.artifact,
    name: entry.name ?? basenameFromUrl(entry.artifact),
    sums,
  };
}

/**
 * Resolve the URL an artifact is fetched from.
 *
 * With a cache pattern and at least one declared sum, the pattern's `#filename#`,
 * `#algorithm#` and `#hash#` markers are replaced literally, using the first
 * algorithm present in SUPPORTED_HASH_ALGORITHMS order. Otherwise the declared
 * source is returned as-is.
 */
export function resolveArtifactUrl(artifact: Artifact, cachePattern?: string): string {
  if (!cachePattern) return artifact.source;

  for (const algorithm of SUPPORTED_HASH_ALGORITHMS) {
    const hash = artifact.sums[algorithm];
    if (hash === undefined) continue;
    return cachePattern
      .split("#filename#")
      .join(artifact.name)
      .split("#algorithm#")
      .join(algorithm)
      .split("#hash#")
      .join(hash);
  }

  return artifact.source;
}

function basenameFromUrl(source: string): string {
  const withoutQuery = source.split(/[?#]/)[0];
  const segments = withoutQuery.split("/").filter((s) => s.length > 0);
  return segments[segments.length - 1] ?? source;
}
