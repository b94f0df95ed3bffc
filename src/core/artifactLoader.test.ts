import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { ArtifactLoadError, loadCompiledPackage, loadModulesFromDir } from "./artifactLoader.js";
import { collectDependencies } from "./dependencies.js";
import { buildModuleBytes } from "../testing/moduleBuilder.js";
import { B_ADDRESS, packageB } from "../testing/fixtures.js";
import { ZERO_ADDRESS } from "../utils/validate.js";

let tmpDir: string;

function writeModule(dir: string, file: string, bytes: Uint8Array): void {
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, file), bytes);
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "move-build-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("loadModulesFromDir", () => {
  it("should load module files sorted by name and ignore everything else", () => {
    writeModule(tmpDir, "zeta.mv", buildModuleBytes({ name: "zeta", address: B_ADDRESS }));
    writeModule(tmpDir, "alpha.mv", buildModuleBytes({ name: "alpha", address: B_ADDRESS }));
    fs.writeFileSync(path.join(tmpDir, "notes.txt"), "not bytecode");
    fs.mkdirSync(path.join(tmpDir, "nested.mv"));

    const modules = loadModulesFromDir(tmpDir);

    expect(modules.map((m) => [m.name, m.address])).toEqual([
      ["alpha", B_ADDRESS],
      ["zeta", B_ADDRESS],
    ]);
  });

  it("should name the file that is not a module binary", () => {
    writeModule(tmpDir, "broken.mv", Uint8Array.of(0xde, 0xad, 0xbe, 0xef, 1, 0, 0, 0));
    const file = path.join(tmpDir, "broken.mv");

    expect(() => loadModulesFromDir(tmpDir)).toThrow(ArtifactLoadError);
    expect(() => loadModulesFromDir(tmpDir)).toThrow(
      `Failed to read module ${file}: Bad magic, not a Move module binary (at byte 0)`
    );
  });
});

describe("loadCompiledPackage", () => {
  it("should load the root package and one package per dependency directory", () => {
    const buildDir = path.join(tmpDir, "my_app");
    const bytecodeDir = path.join(buildDir, "bytecode_modules");
    writeModule(
      bytecodeDir,
      "app.mv",
      buildModuleBytes({ name: "app", address: ZERO_ADDRESS, uses: [{ address: B_ADDRESS, name: "b" }] })
    );
    for (const module of packageB(B_ADDRESS).modules) {
      writeModule(path.join(bytecodeDir, "dependencies", "B"), `${module.name}.mv`, module.bytes);
    }

    const pkg = loadCompiledPackage(buildDir);

    expect(pkg.name).toBe("my_app");
    expect(pkg.modules.map((m) => m.name)).toEqual(["app"]);
    expect([...pkg.dependencies.keys()]).toEqual(["B"]);
    expect(pkg.dependencies.get("B")?.modules.map((m) => m.name)).toEqual(["b", "c", "d"]);
    expect(collectDependencies(pkg).published.map((d) => [d.packages.map((p) => p.name), d.address])).toEqual([
      [["B"], B_ADDRESS],
    ]);
  });

  it("should accept an explicit package name", () => {
    const buildDir = path.join(tmpDir, "build");
    writeModule(path.join(buildDir, "bytecode_modules"), "m.mv", buildModuleBytes({ name: "m", address: B_ADDRESS }));

    expect(loadCompiledPackage(buildDir, "named").name).toBe("named");
  });

  it("should reject a directory without compiled modules", () => {
    const bytecodeDir = path.join(tmpDir, "bytecode_modules");

    expect(() => loadCompiledPackage(tmpDir)).toThrow(`No bytecode_modules directory in ${tmpDir}`);
    try {
      loadCompiledPackage(tmpDir);
    } catch (error) {
      expect(error instanceof ArtifactLoadError ? error.path : null).toBe(bytecodeDir);
    }
  });
});
