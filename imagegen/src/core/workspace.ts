import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { ConfigError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

/** Subtrees of the output directory that a clean run regenerates. */
export const DIRTY_DIRS = [path.join("image", "modules"), path.join("image", "repos"), "repo"] as const;

const REPO_FILE_PATTERN = "*.repo";

/**
 * Remove the regenerated subtrees of `output`. Everything else in `output`
 * (the Dockerfile, staged artifacts, scripts) is left alone.
 */
export function cleanup(output: string, logger: Logger = silentLogger): string[] {
  const removed: string[] = [];
  for (const rel of DIRTY_DIRS) {
    const dir = path.join(output, rel);
    if (fs.existsSync(dir)) {
      logger.debug(`Removing dirty directory: '${dir}'`);
      fs.rmSync(dir, { recursive: true, force: true });
      removed.push(dir);
    }
  }
  return removed;
}

/**
 * Copy `*.repo` files from `repoFilesDir` into `<imageDir>/repos`.
 * Returns the repository names (file names without extension), sorted.
 */
export function prepareExternalRepositories(repoFilesDir: string, imageDir: string, logger: Logger = silentLogger): string[] {
  if (!fs.existsSync(repoFilesDir) || !fs.statSync(repoFilesDir).isDirectory()) {
    throw new ConfigError(`Directory '${repoFilesDir}' with additional repository definitions doesn't exist!`);
  }

  const targetDir = path.join(imageDir, "repos");
  fs.mkdirSync(targetDir, { recursive: true });

  const repoFiles = fs
    .readdirSync(repoFilesDir, { withFileTypes: true })
    .filter((e) => e.isFile() && minimatch(e.name, REPO_FILE_PATTERN))
    .map((e) => e.name)
    .sort();

  for (const file of repoFiles) {
    logger.info(`Copying ${file} repo file...`);
    fs.copyFileSync(path.join(repoFilesDir, file), path.join(targetDir, file));
  }

  return repoFiles.map((f) => path.basename(f, ".repo"));
}

/** Copy a module's directory into `<imageDir>/modules/<name>`. */
export function stageModule(name: string, moduleDir: string, imageDir: string): string {
  const target = path.join(imageDir, "modules", name);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.cpSync(moduleDir, target, { recursive: true });
  return target;
}

/** Copy the contents of a scripts directory into `<output>/scripts`. */
export function stageScripts(scriptsPath: string, output: string): string {
  if (!fs.existsSync(scriptsPath) || !fs.statSync(scriptsPath).isDirectory()) {
    throw new ConfigError(`Provided scripts directory '${scriptsPath}' doesn't exist!`);
  }
  const target = path.join(output, "scripts");
  fs.mkdirSync(target, { recursive: true });
  fs.cpSync(scriptsPath, target, { recursive: true });
  return target;
}

export function isUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}
