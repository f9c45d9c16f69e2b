import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  detectProjectType,
  detectWorkspaceRoot,
  ignorePatterns,
  isWorkspaceRoot,
} from "../../src/workspace/index.js";

describe("workspace detection", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tram-ws-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("walks up to the nearest marker", async () => {
    await writeFile(join(dir, "Cargo.toml"), "[package]\n");
    const nested = join(dir, "src", "bin");
    await mkdir(nested, { recursive: true });

    await expect(detectWorkspaceRoot(nested)).resolves.toBe(dir);
  });

  it("treats a version control directory as a marker", async () => {
    await mkdir(join(dir, ".git"));
    await expect(isWorkspaceRoot(dir)).resolves.toBe(true);
  });

  it("stops at the closest root", async () => {
    await writeFile(join(dir, "package.json"), "{}");
    const inner = join(dir, "services", "api");
    await mkdir(inner, { recursive: true });
    await writeFile(join(inner, "go.mod"), "module example.test/api\n");

    await expect(detectWorkspaceRoot(inner)).resolves.toBe(inner);
  });

  it.each([
    ["Cargo.toml", "rust"],
    ["package.json", "nodejs"],
    ["setup.py", "python"],
    ["go.mod", "go"],
    ["build.gradle", "java"],
    ["Makefile", "generic"],
  ] as const)("detects %s as %s", async (marker, type) => {
    await writeFile(join(dir, marker), "");
    await expect(detectProjectType(dir)).resolves.toBe(type);
  });

  it("prefers earlier project types when several match", async () => {
    await writeFile(join(dir, "package.json"), "{}");
    await writeFile(join(dir, "pyproject.toml"), "");
    await expect(detectProjectType(dir)).resolves.toBe("nodejs");
  });

  it("returns ignore patterns per project type", () => {
    expect(ignorePatterns("rust")).toEqual(["target/", "Cargo.lock"]);
    expect(ignorePatterns("go")).toEqual(["vendor/"]);
  });
});
