export type ImagegenErrorCode = "CONFIG" | "INTEGRITY" | "FETCH" | "SUBSTITUTION";

/**
 * Base class for every failure the generation pipeline reports.
 * `hints` are rendered under the message by the CLI.
 */
export class ImagegenError extends Error {
  constructor(
    message: string,
    public readonly code: ImagegenErrorCode,
    public readonly hints: string[] = [],
  ) {
    super(message);
    this.name = "ImagegenError";
  }
}

/** Missing or unreadable descriptor/schema, or a schema violation. */
export class ConfigError extends ImagegenError {
  constructor(message: string, hints: string[] = []) {
    super(message, "CONFIG", hints);
    this.name = "ConfigError";
  }
}

/** Checksum mismatch after a fresh download. */
export class IntegrityError extends ImagegenError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly algorithm: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(message, "INTEGRITY", [`Expected ${algorithm}:${expected}`, `Actual   ${algorithm}:${actual}`]);
    this.name = "IntegrityError";
  }
}

export class FetchError extends ImagegenError {
  constructor(
    message: string,
    public readonly url: string,
    hints: string[] = [],
  ) {
    super(message, "FETCH", hints);
    this.name = "FetchError";
  }
}

export class SubstitutionError extends ImagegenError {
  constructor(public readonly parameter: string) {
    super(`No value supplied for parameter '${parameter}' and no default declared.`, "SUBSTITUTION", [
      `Pass --param ${parameter}=<value>`,
      `Or declare a default in the descriptor: {{${parameter}:<default>}}`,
    ]);
    this.name = "SubstitutionError";
  }
}

export class CliUsageError extends Error {
  constructor(
    message: string,
    public readonly hints: string[] = [],
  ) {
    super(message);
    this.name = "CliUsageError";
  }
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Render any thrown value as the single message the CLI prints. */
export function renderError(error: unknown): string {
  if (error instanceof ImagegenError || error instanceof CliUsageError) {
    const lines = [`Error: ${error.message}`];
    if (error.hints.length > 0) {
      lines.push("", "How to fix:");
      for (const hint of error.hints) {
        lines.push(`  - ${hint}`);
      }
    }
    return lines.join("\n");
  }

  return `Error: ${errorMessage(error)}`;
}
