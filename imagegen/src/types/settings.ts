/** Generator settings — layered: settings file ← IMAGEGEN_* environment ← CLI flags. */
export type Settings = {
  /** Artifact cache URL pattern with #filename#, #algorithm# and #hash# markers. */
  artifact_cache?: string;
  ssl_verify: boolean;
  check_integrity: boolean;
  fetch_timeout_ms: number;
  dockerfile_name: string;
};
