import path from "node:path";
import Handlebars from "handlebars";
import { artifactFromDescriptor } from "../artifacts/artifact.js";
import type { EffectiveConfiguration, NameValue } from "../types/descriptor.js";

export const DEFAULT_TEMPLATE = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../templates/Dockerfile.hbs");

export type RenderExtras = {
  /** Staged module names, in composition order. */
  modules: string[];
  hasScripts: boolean;
  withoutSources: boolean;
};

const engine = Handlebars.create();

// JSON string quoting for LABEL and ENV values.
engine.registerHelper("quote", (value: unknown) => JSON.stringify(String(value)));
// Exec-form argument list: CMD ["a", "b"].
engine.registerHelper("execForm", (value: unknown) => JSON.stringify(Array.isArray(value) ? value.map(String) : [String(value)]));
engine.registerHelper("join", (value: unknown, sep: unknown) =>
  Array.isArray(value) ? value.map(String).join(typeof sep === "string" ? sep : " ") : "",
);

/** Render a template against a context; output is taken verbatim, nothing is HTML-escaped. */
export function render(templateText: string, context: Record<string, unknown>): string {
  const template = engine.compile(templateText, { noEscape: true });
  return template(context);
}

/** Context for the build-file template: the effective configuration plus derived values. */
export function buildRenderContext(cfg: EffectiveConfiguration, extras: RenderExtras): Record<string, unknown> {
  const imageLabels: NameValue[] = [{ name: "name", value: cfg.name }, { name: "version", value: cfg.version }];
  if (cfg.release !== undefined) imageLabels.push({ name: "release", value: cfg.release });
  if (cfg.description !== undefined) imageLabels.push({ name: "description", value: cfg.description });
  imageLabels.push(...(cfg.labels ?? []));

  return {
    ...cfg,
    image_labels: imageLabels,
    artifacts: (cfg.artifacts ?? []).map(artifactFromDescriptor),
    env_values: (cfg.envs ?? []).filter((e) => e.value !== undefined),
    modules: extras.modules,
    has_scripts: extras.hasScripts,
    without_sources: extras.withoutSources,
  };
}
