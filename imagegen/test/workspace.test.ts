import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { cleanup, isUrl, prepareExternalRepositories, stageModule, stageScripts } from "../src/core/workspace.js";
import { ConfigError } from "../src/errors.js";

describe("workspace", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "imagegen-ws-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("cleanup removes only the regenerated subtrees", () => {
    const output = path.join(tmpDir, "output");
    for (const dir of ["image/modules/java", "image/repos", "repo", "image/other", "scripts"]) {
      fs.mkdirSync(path.join(output, dir), { recursive: true });
    }
    fs.writeFileSync(path.join(output, "Dockerfile"), "FROM scratch\n");
    fs.writeFileSync(path.join(output, "agent.jar"), "jar");

    const removed = cleanup(output);

    expect(removed).toEqual([
      path.join(output, "image", "modules"),
      path.join(output, "image", "repos"),
      path.join(output, "repo"),
    ]);
    expect(fs.readdirSync(output).sort()).toEqual(["Dockerfile", "agent.jar", "image", "scripts"]);
    expect(fs.readdirSync(path.join(output, "image"))).toEqual(["other"]);
  });

  it("cleanup is a no-op on a fresh directory", () => {
    expect(cleanup(tmpDir)).toEqual([]);
  });

  it("copies *.repo files and returns their names", () => {
    const repoDir = path.join(tmpDir, "repos");
    fs.mkdirSync(repoDir);
    fs.writeFileSync(path.join(repoDir, "jboss.repo"), "[jboss]\n");
    fs.writeFileSync(path.join(repoDir, "epel.repo"), "[epel]\n");
    fs.writeFileSync(path.join(repoDir, "README.md"), "docs");

    const imageDir = path.join(tmpDir, "output", "image");
    const names = prepareExternalRepositories(repoDir, imageDir);

    expect(names).toEqual(["epel", "jboss"]);
    expect(fs.readdirSync(path.join(imageDir, "repos")).sort()).toEqual(["epel.repo", "jboss.repo"]);
  });

  it("fails for a missing repository directory", () => {
    expect(() => prepareExternalRepositories(path.join(tmpDir, "nope"), tmpDir)).toThrow(ConfigError);
  });

  it("stages a module directory under image/modules", () => {
    const moduleDir = path.join(tmpDir, "modules", "java");
    fs.mkdirSync(moduleDir, { recursive: true });
    fs.writeFileSync(path.join(moduleDir, "module.yaml"), "name: java\n");
    fs.writeFileSync(path.join(moduleDir, "install.sh"), "#!/bin/sh\n");

    const target = stageModule("java", moduleDir, path.join(tmpDir, "output", "image"));

    expect(target).toBe(path.join(tmpDir, "output", "image", "modules", "java"));
    expect(fs.readdirSync(target).sort()).toEqual(["install.sh", "module.yaml"]);
  });

  it("copies the scripts directory into output/scripts", () => {
    const scripts = path.join(tmpDir, "scripts-src");
    fs.mkdirSync(path.join(scripts, "jolokia"), { recursive: true });
    fs.writeFileSync(path.join(scripts, "jolokia", "install.sh"), "echo hi\n");

    const target = stageScripts(scripts, path.join(tmpDir, "output"));

    expect(fs.readFileSync(path.join(target, "jolokia", "install.sh"), "utf8")).toBe("echo hi\n");
    expect(() => stageScripts(path.join(tmpDir, "missing"), tmpDir)).toThrow(ConfigError);
  });

  it("recognises http(s) URLs only", () => {
    expect(isUrl("a_file.tmp")).toBe(false);
    expect(isUrl("http://host/file.tmp")).toBe(true);
    expect(isUrl("https://host/file.tmp")).toBe(true);
    expect(isUrl("ftp://host/file.tmp")).toBe(false);
  });
});
