/**
 * Dependency closure of a compiled package, grouped by address
 */

import { declaredPackageAddress, isUnpublished } from "./compiledPackage.js";
import { SourceVerificationError } from "./errors.js";
import type { Address, CompiledPackage, DependencyAddress } from "./types.js";

export interface DependencyClosure {
  /** Dependencies that must already be published on chain, one entry per address */
  published: DependencyAddress[];
  /** Dependencies bundled into the root because they were never published */
  unpublished: CompiledPackage[];
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function byName(a: CompiledPackage, b: CompiledPackage): number {
  return compareStrings(a.name, b.name);
}

/**
 * Walk `root.dependencies` transitively with an explicit queue.
 * Each package object is expanded once; diamonds resolve to one entry.
 * Packages published at the same address share an entry; within an address
 * the first package seen under each name is kept.
 * @throws SourceVerificationError (InvalidModule) when a dependency's modules
 * disagree on their address
 */
export function collectDependencies(root: CompiledPackage): DependencyClosure {
  const published = new Map<Address, Map<string, CompiledPackage>>();
  const unpublished = new Map<string, CompiledPackage>();
  const expanded = new Set<CompiledPackage>([root]);
  const queue: CompiledPackage[] = [...root.dependencies.values()].sort(byName);

  while (queue.length > 0) {
    const pkg = queue.shift();
    if (!pkg || expanded.has(pkg)) {
      continue;
    }
    expanded.add(pkg);
    queue.push(...[...pkg.dependencies.values()].sort(byName));

    const declared = declaredPackageAddress(pkg);
    if (!declared.ok) {
      throw new SourceVerificationError({ kind: "InvalidModule", module: declared.module, reason: declared.reason });
    }
    if (declared.address === null) {
      continue;
    }

    if (isUnpublished(declared.address)) {
      if (!unpublished.has(pkg.name)) {
        unpublished.set(pkg.name, pkg);
      }
    } else {
      const atAddress = published.get(declared.address) ?? new Map<string, CompiledPackage>();
      if (!atAddress.has(pkg.name)) {
        atAddress.set(pkg.name, pkg);
      }
      published.set(declared.address, atAddress);
    }
  }

  const groups: DependencyAddress[] = [...published].map(([address, packages]) => ({
    address,
    packages: [...packages.values()].sort(byName),
  }));

  return {
    published: groups.sort((a, b) => {
      const first = a.packages[0].name;
      const second = b.packages[0].name;
      return compareStrings(first, second) || compareStrings(a.address, b.address);
    }),
    unpublished: [...unpublished.values()].sort(byName),
  };
}
