/**
 * Artifact Loader for Move build output
 *
 * Layout produced by the Move compiler:
 *   <buildDir>/bytecode_modules/*.mv                      root package
 *   <buildDir>/bytecode_modules/dependencies/<Dep>/*.mv   one dir per dependency
 */

import fs from "fs";
import path from "path";
import { BinaryFormatError } from "../bytecode/binaryFormat.js";
import { compiledModule, createCompiledPackage } from "./compiledPackage.js";
import type { CompiledModule, CompiledPackage } from "./types.js";

export const BYTECODE_DIR = "bytecode_modules";
export const DEPENDENCIES_DIR = "dependencies";
const BYTECODE_EXTENSIONS = [".mv"];

export class ArtifactLoadError extends Error {
  constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArtifactLoadError";
  }
}

function isBytecodeFile(file: string): boolean {
  return BYTECODE_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

/**
 * Load every module file directly inside `dir`, sorted by file name
 */
export function loadModulesFromDir(dir: string): CompiledModule[] {
  const files = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isBytecodeFile(entry.name))
    .map((entry) => entry.name)
    .sort();

  return files.map((file) => {
    const filePath = path.join(dir, file);
    const bytes = Uint8Array.from(fs.readFileSync(filePath));
    try {
      return compiledModule(bytes);
    } catch (error) {
      if (error instanceof BinaryFormatError) {
        throw new ArtifactLoadError(`Failed to read module ${filePath}: ${error.message}`, filePath, { cause: error });
      }
      throw error;
    }
  });
}

/**
 * Load a compiled package from a Move build directory.
 * The package name defaults to the directory's basename.
 */
export function loadCompiledPackage(buildDir: string, name: string = path.basename(path.resolve(buildDir))): CompiledPackage {
  const bytecodeDir = path.join(buildDir, BYTECODE_DIR);
  if (!fs.existsSync(bytecodeDir) || !fs.statSync(bytecodeDir).isDirectory()) {
    throw new ArtifactLoadError(`No ${BYTECODE_DIR} directory in ${buildDir}`, bytecodeDir);
  }

  const dependencies: CompiledPackage[] = [];
  const depsDir = path.join(bytecodeDir, DEPENDENCIES_DIR);
  if (fs.existsSync(depsDir)) {
    const depNames = fs
      .readdirSync(depsDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
    for (const depName of depNames) {
      dependencies.push(createCompiledPackage(depName, loadModulesFromDir(path.join(depsDir, depName))));
    }
  }

  return createCompiledPackage(name, loadModulesFromDir(bytecodeDir), dependencies);
}
