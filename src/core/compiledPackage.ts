/**
 * Helpers for building and reading CompiledPackage values
 */

import { readModuleBinary } from "../bytecode/binaryFormat.js";
import { isZeroAddress, normalizeAddress, type Address } from "../utils/validate.js";
import type { CompiledModule, CompiledPackage } from "./types.js";

/**
 * Wrap module bytes, taking name and address from the binary itself
 * @throws BinaryFormatError if `bytes` is not a Move module
 */
export function compiledModule(bytes: Uint8Array): CompiledModule {
  const binary = readModuleBinary(bytes);
  return { name: binary.name, address: binary.address, bytes };
}

export function createCompiledPackage(
  name: string,
  modules: CompiledModule[],
  dependencies: CompiledPackage[] = []
): CompiledPackage {
  const addresses = new Map<string, Address>();
  const first = modules[0];
  if (first) {
    addresses.set(name, first.address);
  }
  for (const dep of dependencies) {
    for (const [depName, depAddress] of dep.addresses) {
      if (!addresses.has(depName)) {
        addresses.set(depName, depAddress);
      }
    }
  }
  return {
    name,
    modules,
    dependencies: new Map(dependencies.map((dep) => [dep.name, dep])),
    addresses,
  };
}

export type PackageAddressResult =
  | { ok: true; address: Address | null }
  | { ok: false; module: string; reason: string };

/**
 * Address a package is declared at: its modules' self address, or its
 * address-table entry when it has no modules. `null` when neither exists.
 */
export function declaredPackageAddress(pkg: CompiledPackage): PackageAddressResult {
  const first = pkg.modules[0];
  if (!first) {
    const entry = pkg.addresses.get(pkg.name);
    return { ok: true, address: entry ? normalizeAddress(entry) : null };
  }

  const address = normalizeAddress(first.address);
  for (const module of pkg.modules) {
    if (normalizeAddress(module.address) !== address) {
      return {
        ok: false,
        module: module.name,
        reason: `declared at ${module.address} but package ${pkg.name} is at ${address}`,
      };
    }
  }
  return { ok: true, address };
}

export function isUnpublished(address: Address): boolean {
  return isZeroAddress(address);
}
