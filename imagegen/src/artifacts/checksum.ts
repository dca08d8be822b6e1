import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { IntegrityError } from "../errors.js";

/** Supported digest algorithms, in the order the artifact cache prefers them. */
export const SUPPORTED_HASH_ALGORITHMS = ["sha256", "sha1", "md5"] as const;

export type HashAlgorithm = (typeof SUPPORTED_HASH_ALGORITHMS)[number];

const CHUNK_SIZE = 64 * 1024;

export function isSupportedAlgorithm(value: string): value is HashAlgorithm {
  return SUPPORTED_HASH_ALGORITHMS.some((algorithm) => algorithm === value);
}

/** Compute the hex digest of a file, reading it in fixed-size chunks. */
export function computeDigest(filePath: string, algorithm: HashAlgorithm): string {
  const hash = createHash(algorithm);
  const fd = fs.openSync(filePath, "r");
  const chunk = Buffer.allocUnsafe(CHUNK_SIZE);

  try {
    while (true) {
      const read = fs.readSync(fd, chunk, 0, chunk.length, null);
      if (read <= 0) {
        break;
      }
      hash.update(chunk.subarray(0, read));
    }
  } finally {
    fs.closeSync(fd);
  }

  return hash.digest("hex");
}

/**
 * Verify a file against an expected hex digest.
 * @throws IntegrityError when the digests differ (compared case-insensitively)
 */
export function verifyChecksum(filePath: string, algorithm: HashAlgorithm, expected: string): void {
  const actual = computeDigest(filePath, algorithm);
  if (actual.toLowerCase() !== expected.toLowerCase()) {
    throw new IntegrityError(
      `The ${algorithm} computed for the '${path.basename(filePath)}' file ('${actual}') doesn't match the '${expected}' value`,
      filePath,
      algorithm,
      expected,
      actual,
    );
  }
}
