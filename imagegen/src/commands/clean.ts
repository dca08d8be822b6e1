import fs from "node:fs";
import { cleanup } from "../core/workspace.js";
import type { Logger } from "../logger.js";

export type CleanResult = { ok: true; removed: string[] } | { ok: false; error: string };

/**
 * Remove the regenerated subtrees of an output directory.
 */
export function clean(opts: { output: string; logger?: Logger }): CleanResult {
  if (!fs.existsSync(opts.output)) {
    return { ok: false, error: `Output directory not found: ${opts.output}` };
  }
  return { ok: true, removed: cleanup(opts.output, opts.logger) };
}
