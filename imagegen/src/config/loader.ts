import fs from "node:fs";
import YAML from "yaml";
import { ConfigError } from "../errors.js";
import type { Settings } from "../types/settings.js";

export const DEFAULT_SETTINGS: Settings = {
  ssl_verify: true,
  check_integrity: true,
  fetch_timeout_ms: 60_000,
  dockerfile_name: "Dockerfile",
};

const ENV_PREFIX = "IMAGEGEN_";
const SETTINGS_KEYS = ["artifact_cache", "ssl_verify", "check_integrity", "fetch_timeout_ms", "dockerfile_name"];

/** Load a YAML settings file; a missing file is an error only when the path was given explicitly. */
function loadYaml(filePath: string, required: boolean): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    if (required) throw new ConfigError(`Settings file not found: ${filePath}`);
    return {};
  }
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Settings file must contain a mapping: ${filePath}`);
  }
  return { ...parsed };
}

/** Apply IMAGEGEN_ prefixed environment variable overrides for known settings keys. */
function applyEnvOverrides(settings: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // IMAGEGEN_ARTIFACT_CACHE → artifact_cache
    const settingsKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (SETTINGS_KEYS.includes(settingsKey)) settings[settingsKey] = value;
  }
  return settings;
}

/**
 * Load layered settings: defaults ← settings file ← environment variables.
 * The result is unvalidated; see validateSettings.
 *
 * @param settingsPath - Explicit settings file; defaults to `imagegen.yaml` in the working directory.
 */
export function loadSettings(settingsPath?: string, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const fromFile = loadYaml(settingsPath ?? "imagegen.yaml", settingsPath !== undefined);
  return applyEnvOverrides({ ...DEFAULT_SETTINGS, ...fromFile }, env);
}
