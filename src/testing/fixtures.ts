/**
 * Two-package fixture: `a` depends on `b`; `b` has modules b, c and d.
 */

import { compiledModule, createCompiledPackage } from "../core/compiledPackage.js";
import type { CompiledModule, CompiledPackage } from "../core/types.js";
import { ZERO_ADDRESS, type Address } from "../utils/validate.js";
import { buildModuleBytes, type ModuleSpec } from "./moduleBuilder.js";

export const A_ADDRESS = `0x${"a1".repeat(32)}`;
export const B_ADDRESS = `0x${"b2".repeat(32)}`;
export const OTHER_ADDRESS = `0x${"c3".repeat(32)}`;

export interface PackageBOptions {
  omit?: string[];
  /** Literal in module c */
  c?: bigint;
}

export function moduleOf(spec: ModuleSpec): CompiledModule {
  return compiledModule(buildModuleBytes(spec));
}

export function packageB(address: Address = ZERO_ADDRESS, options: PackageBOptions = {}): CompiledPackage {
  const specs: ModuleSpec[] = [
    { name: "b", address, uses: [{ address, name: "c" }], constants: [7n] },
    { name: "c", address, constants: [options.c ?? 43n] },
    { name: "d", address, uses: [{ address, name: "c" }], constants: [1n, 2n] },
  ];
  return createCompiledPackage(
    "b",
    specs.filter((spec) => !options.omit?.includes(spec.name)).map(moduleOf)
  );
}

export interface PackageAOptions {
  /** Literal in module a */
  a?: bigint;
}

export function packageA(
  address: Address,
  b: CompiledPackage,
  bAddress: Address,
  options: PackageAOptions = {}
): CompiledPackage {
  const a = moduleOf({
    name: "a",
    address,
    uses: [
      { address: bAddress, name: "b" },
      { address: bAddress, name: "c" },
    ],
    constants: [options.a ?? 123n],
  });
  return createCompiledPackage("a", [a], [b]);
}
