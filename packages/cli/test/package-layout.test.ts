/**
 * Build layout: published entry points must be files the per-package build emits
 */

import { describe, it, expect } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import * as path from "node:path";

const CLI_DIR = fileURLToPath(new URL("..", import.meta.url));
const CORE_DIR = path.join(CLI_DIR, "../core");

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(file, "utf-8"));
}

function field(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (typeof current !== "object" || current === null || !(key in current)) {
      return undefined;
    }
    current = Object.entries(current).find(([name]) => name === key)?.[1];
  }
  return current;
}

/**
 * Where `tsc -b tsconfig.build.json` writes the JS for a source file, relative to the package
 */
function emittedPath(packageDir: string, source: string): string {
  const build = readJson(path.join(packageDir, "tsconfig.build.json"));
  const rootDir = String(field(build, "compilerOptions", "rootDir"));
  const outDir = String(field(build, "compilerOptions", "outDir"));
  const relative = path.relative(rootDir, source).replace(/\.ts$/, ".js");
  return `./${path.posix.join(outDir, relative)}`;
}

describe("package layout", () => {
  it("should point the trimseq bin at the emitted entry point", () => {
    const pkg = readJson(path.join(CLI_DIR, "package.json"));

    expect(existsSync(path.join(CLI_DIR, "src/cli.ts"))).toBe(true);
    expect(field(pkg, "bin", "trimseq")).toBe(emittedPath(CLI_DIR, "src/cli.ts"));
    expect(field(pkg, "bin", "trimseq")).toBe("./dist/cli.js");
  });

  it("should read the version from the package root after the build", () => {
    const source = readFileSync(path.join(CLI_DIR, "src/cli.ts"), "utf-8");
    expect(source).toContain('new URL("../package.json", import.meta.url)');

    const emitted = path.join(CLI_DIR, emittedPath(CLI_DIR, "src/cli.ts"));
    expect(path.resolve(path.dirname(emitted), "../package.json")).toBe(path.join(CLI_DIR, "package.json"));
  });

  it("should load core from its build at runtime and from sources for types", () => {
    const pkg = readJson(path.join(CORE_DIR, "package.json"));

    expect(field(pkg, "exports", ".", "default")).toBe(emittedPath(CORE_DIR, "src/index.ts"));
    expect(field(pkg, "exports", ".", "types")).toBe("./src/index.ts");
    expect(field(pkg, "main")).toBe("./dist/index.js");
  });

  it("should build core before the cli", () => {
    const build = readJson(path.join(CLI_DIR, "tsconfig.build.json"));
    expect(field(build, "references")).toEqual([{ path: "../core/tsconfig.build.json" }]);
    expect(field(readJson(path.join(CORE_DIR, "tsconfig.build.json")), "compilerOptions", "composite")).toBe(true);
  });
});
