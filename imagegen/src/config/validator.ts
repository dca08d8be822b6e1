import { ConfigError } from "../errors.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { Settings } from "../types/settings.js";

/**
 * Validate layered settings against schemas/settings.schema.json.
 * String values coming from the environment are coerced in place.
 */
export async function validateSettings(raw: Record<string, unknown>, registry?: SchemaRegistry): Promise<Settings> {
  const reg = registry ?? (await createRegistry());
  const { valid, errors } = await reg.validate("settings", raw);
  if (!valid || !isSettings(raw)) {
    throw new ConfigError(`Invalid settings: ${errors ?? "missing required keys"}`);
  }
  return raw;
}

function isSettings(raw: Record<string, unknown>): raw is Settings {
  return (
    typeof raw.ssl_verify === "boolean" &&
    typeof raw.check_integrity === "boolean" &&
    typeof raw.fetch_timeout_ms === "number" &&
    typeof raw.dockerfile_name === "string"
  );
}
