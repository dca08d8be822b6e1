import type { HttpTransport } from "../artifacts/transport.js";
import { loadSettings } from "../config/loader.js";
import { validateSettings } from "../config/validator.js";
import { Generator, type GenerationResult } from "../core/generator.js";
import type { GenerationStatus } from "../core/state-machine.js";
import { parseParams } from "../descriptor/substitution.js";
import { renderError } from "../errors.js";
import type { Logger } from "../logger.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export type GenerateInput = {
  descriptor: string;
  output: string;
  template?: string;
  modulesPath?: string;
  repoFilesDir?: string;
  scriptsPath?: string;
  additionalScripts?: string[];
  withoutSources?: boolean;
  skipSslVerification?: boolean;
  skipIntegrity?: boolean;
  /** Repeated NAME=VALUE pairs. */
  params?: string[];
  /** Settings file path. */
  config?: string;
  env?: NodeJS.ProcessEnv;
  transport?: HttpTransport;
  logger?: Logger;
};

export type GenerateResult =
  | { ok: true; result: GenerationResult }
  | { ok: false; error: string; exitCode: ExitCode; status?: GenerationStatus };

/**
 * Generate a build file. CLI flags override the layered settings.
 */
export async function generate(input: GenerateInput): Promise<GenerateResult> {
  let generator: Generator | undefined;
  try {
    const settings = await validateSettings(loadSettings(input.config, input.env));
    if (input.skipSslVerification) settings.ssl_verify = false;
    if (input.skipIntegrity) settings.check_integrity = false;

    generator = new Generator({
      descriptor: input.descriptor,
      output: input.output,
      template: input.template,
      modulesPath: input.modulesPath,
      repoFilesDir: input.repoFilesDir,
      scriptsPath: input.scriptsPath,
      additionalScripts: input.additionalScripts,
      withoutSources: input.withoutSources,
      params: parseParams(input.params ?? []),
      settings,
      transport: input.transport,
      logger: input.logger,
    });

    return { ok: true, result: await generator.run() };
  } catch (e) {
    return { ok: false, error: renderError(e), exitCode: exitCodeFor(e), status: generator?.status };
  }
}
