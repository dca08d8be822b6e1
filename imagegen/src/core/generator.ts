import fs from "node:fs";
import path from "node:path";
import { artifactFromDescriptor } from "../artifacts/artifact.js";
import { ArtifactFetcher } from "../artifacts/fetcher.js";
import type { HttpTransport } from "../artifacts/transport.js";
import { compose, loadModules } from "../descriptor/composer.js";
import { loadDescriptor } from "../descriptor/loader.js";
import type { SubstitutionContext } from "../descriptor/substitution.js";
import { ConfigError, FetchError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { buildRenderContext, DEFAULT_TEMPLATE, render } from "../render/template.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { EffectiveConfiguration, ImageDescriptor, ModuleDescriptor } from "../types/descriptor.js";
import type { Settings } from "../types/settings.js";
import { type GenerationStatus, type GenerationState, type GenerationStep, nextState } from "./state-machine.js";
import { isUrl, prepareExternalRepositories, stageModule, stageScripts } from "./workspace.js";

/** uid the image runs as when neither the image nor a module sets one. */
export const DEFAULT_USER = 0;

export type GeneratorOptions = {
  /** Image descriptor file. */
  descriptor: string;
  /** Output directory. */
  output: string;
  /** Custom template: local path or http(s) URL. */
  template?: string;
  /** Module search path; defaults to `<descriptor dir>/modules`. */
  modulesPath?: string;
  repoFilesDir?: string;
  scriptsPath?: string;
  /** Extra scripts (paths or URLs) placed in `<output>/scripts`. */
  additionalScripts?: string[];
  /** Skip fetching artifacts; the build file still references them. */
  withoutSources?: boolean;
  params?: Record<string, string>;
  settings: Settings;
  schemaDir?: string;
  transport?: HttpTransport;
  logger?: Logger;
};

export type GenerationResult = {
  dockerfile: string;
  artifacts: Array<{ name: string; path: string }>;
  modules: string[];
  repositories: string[];
  status: GenerationStatus;
};

/**
 * Generator — drives one run: load → compose → substitute → fetch artifacts → render.
 *
 * Every step is fatal: the failure is recorded as `failed_<step>` and the
 * original error is rethrown. Nothing is cleaned up on failure; call
 * `cleanup()` before re-running.
 */
export class Generator {
  private state: GenerationStatus = "init";
  private readonly logger: Logger;
  private readonly fetcher: ArtifactFetcher;
  private readonly substitution: SubstitutionContext;

  private registry: SchemaRegistry | null = null;
  private root: ImageDescriptor | null = null;
  private composed: ImageDescriptor | null = null;
  private modules: Array<{ name: string; dir: string; descriptor: ModuleDescriptor }> = [];
  private cfg: EffectiveConfiguration | null = null;
  private templatePath: string = DEFAULT_TEMPLATE;
  private templateFetched = false;
  private fetched: Array<{ name: string; path: string }> = [];

  constructor(private readonly opts: GeneratorOptions) {
    this.logger = opts.logger ?? silentLogger;
    this.substitution = { overrides: opts.params ?? {} };
    this.fetcher = new ArtifactFetcher({
      targetDir: opts.output,
      sslVerify: opts.settings.ssl_verify,
      checkIntegrity: opts.settings.check_integrity,
      artifactCache: opts.settings.artifact_cache,
      timeoutMs: opts.settings.fetch_timeout_ms,
      transport: opts.transport,
      logger: this.logger,
    });
  }

  get status(): GenerationStatus {
    return this.state;
  }

  /** Effective configuration, available once the substitute step has run. */
  get effective(): EffectiveConfiguration | null {
    return this.cfg;
  }

  async run(): Promise<GenerationResult> {
    let dockerfile: string;
    try {
      await this.advance("init", "load", () => this.load());
      await this.advance("loaded", "compose", () => this.compose());
      await this.advance("composed", "substitute", () => this.finalize());
      await this.advance("substituted", "fetch_artifacts", () => this.fetchAndStage());
      dockerfile = await this.advance("artifacts_fetched", "render", () => this.render());
    } finally {
      // a downloaded template lives in the temp directory
      if (this.templateFetched) fs.rmSync(this.templatePath, { force: true });
    }
    this.state = nextState("rendered", "success");

    const cfg = this.requireConfig();
    return {
      dockerfile,
      artifacts: this.fetched,
      modules: this.modules.map((m) => m.name),
      repositories: cfg.repositories ?? [],
      status: this.state,
    };
  }

  private async advance<T>(from: GenerationState, step: GenerationStep, fn: () => Promise<T>): Promise<T> {
    this.logger.debug(`Step ${step}`);
    try {
      const result = await fn();
      this.state = nextState(from, "success");
      return result;
    } catch (e) {
      this.state = `failed_${step}`;
      throw e;
    }
  }

  private async load(): Promise<void> {
    this.registry = await createRegistry(this.opts.schemaDir);
    this.root = await loadDescriptor(this.opts.descriptor, "image", {
      substitution: this.substitution,
      registry: this.registry,
      logger: this.logger,
    });
    await this.handleCustomTemplate();
  }

  /** Fetch a remote template to a temporary file, then make sure the template exists. */
  private async handleCustomTemplate(): Promise<void> {
    const template = this.opts.template;
    if (!template) return;

    if (isUrl(template)) {
      this.templatePath = await this.fetcher.fetchFile(template);
      this.templateFetched = true;
    } else {
      this.templatePath = template;
    }

    if (!fs.existsSync(this.templatePath)) {
      throw new FetchError(
        `Template file '${this.templatePath}' could not be found. Please make sure you specified correct path or check if the file was successfully fetched.`,
        template,
      );
    }
  }

  private async compose(): Promise<void> {
    const root = this.root;
    if (!root) throw new Error("Descriptor not loaded");
    this.modules = await loadModules(root, {
      modulesPath: this.opts.modulesPath ?? path.join(path.dirname(this.opts.descriptor), "modules"),
      substitution: this.substitution,
      registry: this.registry ?? undefined,
      logger: this.logger,
    });
    this.composed = compose(
      root,
      this.modules.map((m) => m.descriptor),
    );
  }

  /** Apply built-in defaults and re-validate the composed configuration. */
  private async finalize(): Promise<void> {
    const composed = this.composed;
    if (!composed) throw new Error("Modules not composed");
    const cfg: EffectiveConfiguration = { ...composed, user: composed.user ?? DEFAULT_USER };

    if (this.registry) {
      const { valid, errors } = await this.registry.validate("image", cfg);
      if (!valid) {
        throw new ConfigError(`Composed image configuration is invalid: ${errors}`);
      }
    }
    this.cfg = cfg;
  }

  private async fetchAndStage(): Promise<void> {
    const cfg = this.requireConfig();
    const output = this.opts.output;
    const imageDir = path.join(output, "image");
    fs.mkdirSync(output, { recursive: true });

    if (this.opts.withoutSources) {
      this.logger.info("Skipping artifact fetching.");
    } else {
      // Sequential on purpose: each artifact is fetched and verified before the next.
      for (const entry of cfg.artifacts ?? []) {
        const artifact = artifactFromDescriptor(entry);
        const filePath = await this.fetcher.fetch(artifact);
        this.fetched.push({ name: artifact.name, path: filePath });
      }
    }

    for (const mod of this.modules) {
      stageModule(mod.name, mod.dir, imageDir);
    }

    if (this.opts.repoFilesDir) {
      const names = prepareExternalRepositories(this.opts.repoFilesDir, imageDir, this.logger);
      cfg.repositories = [...new Set([...(cfg.repositories ?? []), ...names])];
    }

    if (this.opts.scriptsPath) {
      stageScripts(this.opts.scriptsPath, output);
    }

    for (const script of this.opts.additionalScripts ?? []) {
      const target = path.join(output, "scripts", path.basename(script));
      if (isUrl(script)) {
        await this.fetcher.fetchFile(script, target);
      } else if (fs.existsSync(script)) {
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.copyFileSync(script, target);
      } else {
        throw new ConfigError(`Additional script '${script}' doesn't exist!`);
      }
    }
  }

  private async render(): Promise<string> {
    const cfg = this.requireConfig();
    const templateText = fs.readFileSync(this.templatePath, "utf8");
    const context = buildRenderContext(cfg, {
      modules: this.modules.map((m) => m.name),
      hasScripts: fs.existsSync(path.join(this.opts.output, "scripts")),
      withoutSources: this.opts.withoutSources ?? false,
    });

    const dockerfile = path.join(this.opts.output, this.opts.settings.dockerfile_name);
    fs.writeFileSync(dockerfile, render(templateText, context), "utf8");
    this.logger.info(`Generated ${dockerfile}`);
    return dockerfile;
  }

  private requireConfig(): EffectiveConfiguration {
    if (!this.cfg) throw new Error("Configuration not resolved");
    return this.cfg;
  }
}
