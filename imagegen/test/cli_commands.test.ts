import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { clean } from "../src/commands/clean.js";
import { EXIT, exitCodeFor } from "../src/commands/exit-codes.js";
import { generate } from "../src/commands/generate.js";
import { validateDescriptor } from "../src/commands/validate.js";
import { CliUsageError, ConfigError, FetchError, IntegrityError, SubstitutionError } from "../src/errors.js";
import { stubTransport } from "./helpers/http-stub.js";

describe("imagegen commands", () => {
  let workdir: string;
  let descriptor: string;
  let output: string;

  beforeEach(() => {
    workdir = fs.mkdtempSync(path.join(os.tmpdir(), "imagegen-cli-"));
    descriptor = path.join(workdir, "image.yaml");
    output = path.join(workdir, "target");
  });

  afterEach(() => {
    fs.rmSync(workdir, { recursive: true, force: true });
  });

  describe("generate", () => {
    it("renders the Dockerfile", async () => {
      fs.writeFileSync(descriptor, "name: app\nversion: '2'\nfrom: {{BASE:scratch}}\ncmd: [run]\n");
      const res = await generate({ descriptor, output, params: ["BASE=alpine:3"], env: {} });

      expect(res.ok).toBe(true);
      if (res.ok) {
        expect(res.result.dockerfile).toBe(path.join(output, "Dockerfile"));
        expect(res.result.status).toBe("done");
      }
      expect(fs.readFileSync(path.join(output, "Dockerfile"), "utf8")).toContain("\nFROM alpine:3\n");
    });

    it("reports schema violations as invalid input", async () => {
      fs.writeFileSync(descriptor, "name: app\nversion: '2'\n");
      const res = await generate({ descriptor, output, env: {} });

      expect(res.ok).toBe(false);
      if (!res.ok) {
        expect(res.exitCode).toBe(EXIT.INPUT_INVALID);
        expect(res.status).toBe("failed_load");
        expect(res.error).toBe(`Error: Cannot validate image descriptor ${descriptor}: image must have required property 'from'`);
      }
    });

    it("reports malformed parameters as invalid arguments", async () => {
      fs.writeFileSync(descriptor, "name: app\nversion: '2'\nfrom: scratch\n");
      const res = await generate({ descriptor, output, params: ["BASE"], env: {} });

      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
    });

    it("honours --skip-integrity", async () => {
      fs.writeFileSync(
        descriptor,
        `name: app\nversion: '2'\nfrom: scratch\nartifacts:\n  - artifact: http://repo.test/a.bin\n    md5: ${"f".repeat(32)}\n`,
      );
      const { transport } = stubTransport({ "http://repo.test/a.bin": "data" });

      const failing = await generate({ descriptor, output, transport, env: {} });
      expect(failing.ok).toBe(false);
      if (!failing.ok) expect(failing.exitCode).toBe(EXIT.GENERATION_FAILED);

      fs.rmSync(path.join(output, "a.bin"));
      const passing = await generate({ descriptor, output, transport, skipIntegrity: true, env: {} });
      expect(passing.ok).toBe(true);
    });

    it("takes the artifact cache from the environment", async () => {
      fs.writeFileSync(
        descriptor,
        `name: app\nversion: '2'\nfrom: scratch\nartifacts:\n  - artifact: http://repo.test/a.bin\n    sha1: ${"a".repeat(40)}\n`,
      );
      const { transport, calls } = stubTransport({});

      const res = await generate({
        descriptor,
        output,
        transport,
        env: { IMAGEGEN_ARTIFACT_CACHE: "http://cache.test/#algorithm#/#hash#" },
      });

      expect(res.ok).toBe(false);
      expect(calls).toEqual([`http://cache.test/sha1/${"a".repeat(40)}`]);
    });
  });

  describe("validate", () => {
    it("lists placeholders of a valid descriptor", async () => {
      fs.writeFileSync(descriptor, "name: app\nversion: '{{VERSION:1}}'\nfrom: {{BASE}}\n");
      const res = await validateDescriptor({ descriptor, type: "image", params: ["BASE=scratch"] });

      expect(res).toEqual({ ok: true, placeholders: [{ name: "VERSION", default: "1" }, { name: "BASE" }] });
    });

    it("reports placeholders without a value", async () => {
      fs.writeFileSync(descriptor, "name: app\nversion: '1'\nfrom: {{BASE}}\n");
      const res = await validateDescriptor({ descriptor, type: "image" });

      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["PARAM_UNRESOLVED"]);
    });

    it("does not treat object prototype names as supplied", async () => {
      fs.writeFileSync(descriptor, "name: app\nversion: '1'\nfrom: {{constructor}}\n");
      const res = await validateDescriptor({ descriptor, type: "image" });

      expect(res).toEqual({
        ok: false,
        errors: [
          {
            level: "error",
            code: "PARAM_UNRESOLVED",
            message: "Parameter 'constructor' has no default and no value was supplied",
            path: descriptor,
          },
        ],
      });
    });

    it("reports schema violations", async () => {
      fs.writeFileSync(descriptor, "name: jolokia\nfrom: scratch\n");
      const res = await validateDescriptor({ descriptor, type: "module" });

      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.errors[0].code).toBe("DESCRIPTOR_INVALID");
    });

    it("fails when the descriptor is missing", async () => {
      const res = await validateDescriptor({ descriptor: path.join(workdir, "nope.yaml"), type: "image" });
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.errors[0].message).toMatch(/Descriptor not found/);
    });
  });

  describe("clean", () => {
    it("removes the regenerated subtrees", () => {
      fs.mkdirSync(path.join(output, "image", "repos"), { recursive: true });
      fs.writeFileSync(path.join(output, "Dockerfile"), "FROM scratch\n");

      const res = clean({ output });

      expect(res).toEqual({ ok: true, removed: [path.join(output, "image", "repos")] });
      expect(fs.existsSync(path.join(output, "Dockerfile"))).toBe(true);
    });

    it("fails for a missing output directory", () => {
      expect(clean({ output }).ok).toBe(false);
    });
  });

  it("maps error kinds to exit codes", () => {
    expect(exitCodeFor(new ConfigError("x"))).toBe(EXIT.INPUT_INVALID);
    expect(exitCodeFor(new SubstitutionError("X"))).toBe(EXIT.INPUT_INVALID);
    expect(exitCodeFor(new FetchError("x", "http://h"))).toBe(EXIT.GENERATION_FAILED);
    expect(exitCodeFor(new IntegrityError("x", "f", "md5", "a", "b"))).toBe(EXIT.GENERATION_FAILED);
    expect(exitCodeFor(new CliUsageError("x"))).toBe(EXIT.INVALID_ARGS);
  });
});
