#!/usr/bin/env node

import { Command } from "commander";
import { clean } from "./commands/clean.js";
import { EXIT } from "./commands/exit-codes.js";
import { generate } from "./commands/generate.js";
import { validateDescriptor } from "./commands/validate.js";
import { createConsoleLogger } from "./logger.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name("imagegen")
  .description("Generate a Dockerfile from a YAML image descriptor")
  .version("0.1.0");

program
  .command("generate")
  .description("Compose the descriptor with its modules, fetch artifacts and render the Dockerfile")
  .argument("<descriptor>", "Path to the image descriptor (YAML)")
  .argument("<output>", "Output directory")
  .option("--template <path|url>", "Custom template file or URL")
  .option("--modules-path <path>", "Directory modules are looked up in (default: <descriptor dir>/modules)")
  .option("--repo-files-dir <path>", "Directory with additional *.repo files")
  .option("--scripts-path <path>", "Directory with scripts to copy into the output")
  .option("--additional-script <path|url>", "Additional script to include (repeatable)", collect, [])
  .option("--without-sources", "Do not fetch artifacts")
  .option("--skip-ssl-verification", "Do not verify TLS certificates when fetching")
  .option("--skip-integrity", "Do not verify artifact checksums")
  .option("--param <NAME=VALUE>", "Placeholder override (repeatable)", collect, [])
  .option("--config <path>", "Settings file (default: ./imagegen.yaml when present)")
  .option("--verbose", "Print debug output")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (
      descriptor: string,
      output: string,
      opts: {
        template?: string;
        modulesPath?: string;
        repoFilesDir?: string;
        scriptsPath?: string;
        additionalScript: string[];
        withoutSources?: boolean;
        skipSslVerification?: boolean;
        skipIntegrity?: boolean;
        param: string[];
        config?: string;
        verbose?: boolean;
        format: "human" | "jsonl";
      },
    ) => {
      const res = await generate({
        descriptor,
        output,
        template: opts.template,
        modulesPath: opts.modulesPath,
        repoFilesDir: opts.repoFilesDir,
        scriptsPath: opts.scriptsPath,
        additionalScripts: opts.additionalScript,
        withoutSources: opts.withoutSources,
        skipSslVerification: opts.skipSslVerification,
        skipIntegrity: opts.skipIntegrity,
        params: opts.param,
        config: opts.config,
        logger: createConsoleLogger({ verbose: opts.verbose }),
      });

      if (!res.ok) {
        if (opts.format === "jsonl") {
          process.stdout.write(JSON.stringify({ level: "error", status: res.status, error: res.error }) + "\n");
        } else {
          console.error(res.error);
        }
        process.exit(res.exitCode);
      }

      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "info", ...res.result }) + "\n");
      } else {
        console.log(res.result.dockerfile);
      }
    },
  );

program
  .command("validate")
  .description("Validate a descriptor against its schema")
  .argument("<descriptor>", "Path to the descriptor (YAML)")
  .option("--type <type>", "Descriptor type: image|module", "image")
  .option("--param <NAME=VALUE>", "Placeholder override (repeatable)", collect, [])
  .option("--list-params", "List the placeholders the descriptor declares")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (descriptor: string, opts: { type: string; param: string[]; listParams?: boolean; format: "human" | "jsonl" }) => {
      if (opts.type !== "image" && opts.type !== "module") {
        console.error(`Unknown descriptor type: ${opts.type}`);
        process.exit(EXIT.INVALID_ARGS);
      }

      const res = await validateDescriptor({ descriptor, type: opts.type, params: opts.param });

      if (!res.ok) {
        if (opts.format === "jsonl") {
          for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
        } else {
          for (const err of res.errors) console.error(err.message);
        }
        process.exit(EXIT.INPUT_INVALID);
      }

      if (opts.listParams) {
        for (const p of res.placeholders) {
          if (opts.format === "jsonl") {
            process.stdout.write(JSON.stringify(p) + "\n");
          } else {
            console.log(p.default === undefined ? p.name : `${p.name} (default: ${p.default})`);
          }
        }
        return;
      }

      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
      } else {
        console.log("OK");
      }
    },
  );

program
  .command("clean")
  .description("Remove image/modules, image/repos and repo from an output directory")
  .argument("<output>", "Output directory")
  .option("--verbose", "Print debug output")
  .action((output: string, opts: { verbose?: boolean }) => {
    const res = clean({ output, logger: createConsoleLogger({ verbose: opts.verbose }) });
    if (!res.ok) {
      console.error(res.error);
      process.exit(EXIT.INVALID_ARGS);
    }
    for (const dir of res.removed) console.log(`Removed ${dir}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
