/**
 * Per-package module comparison between a local build and on-chain bytecode
 */

import { BinaryFormatError } from "./binaryFormat.js";
import { substituteAddress } from "./normalize.js";
import { bytesEqual } from "../utils/hash.js";
import { ZERO_ADDRESS, type Address } from "../utils/validate.js";
import type { CompiledModule } from "../core/types.js";
import { SourceVerificationError, type SourceVerificationFailure } from "../core/errors.js";

export interface LocalPackageModule {
  packageName: string;
  module: CompiledModule;
}

export interface PackageComparisonInput {
  address: Address;
  local: LocalPackageModule[];
  onChain: Map<string, Uint8Array>;
}

export type ModuleDiscrepancy = Extract<
  SourceVerificationFailure,
  { kind: "OnChainDependencyNotFound" | "LocalDependencyNotFound" | "ModuleBytecodeMismatch" }
>;

export interface MatchedModule {
  name: string;
  packageName: string;
  bytes: Uint8Array;
}

export interface PackageComparison {
  matched: MatchedModule[];
  discrepancies: ModuleDiscrepancy[];
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function normalizeLocal(entry: LocalPackageModule, address: Address): Uint8Array {
  try {
    return substituteAddress(entry.module.bytes, ZERO_ADDRESS, address);
  } catch (error) {
    if (error instanceof BinaryFormatError) {
      throw new SourceVerificationError(
        { kind: "InvalidModule", module: entry.module.name, reason: error.message },
        { cause: error }
      );
    }
    throw error;
  }
}

/**
 * Compare one package's local modules (normalized against `address`) with the
 * modules published there. Names are visited in code-unit order over both sides.
 * When two local entries share a module name, the first one is compared.
 */
export function comparePackageModules(input: PackageComparisonInput): PackageComparison {
  const { address, onChain } = input;
  const local = new Map<string, LocalPackageModule>();
  for (const entry of input.local) {
    if (!local.has(entry.module.name)) {
      local.set(entry.module.name, entry);
    }
  }

  const names = [...new Set([...local.keys(), ...onChain.keys()])].sort(compareNames);
  const matched: MatchedModule[] = [];
  const discrepancies: ModuleDiscrepancy[] = [];

  for (const name of names) {
    const localEntry = local.get(name);
    const onChainBytes = onChain.get(name);

    if (!localEntry) {
      discrepancies.push({ kind: "LocalDependencyNotFound", address, module: name });
      continue;
    }
    if (!onChainBytes) {
      discrepancies.push({ kind: "OnChainDependencyNotFound", package: localEntry.packageName, module: name });
      continue;
    }

    const normalized = normalizeLocal(localEntry, address);
    if (!bytesEqual(normalized, onChainBytes)) {
      discrepancies.push({
        kind: "ModuleBytecodeMismatch",
        address,
        package: localEntry.packageName,
        module: name,
      });
      continue;
    }

    matched.push({ name, packageName: localEntry.packageName, bytes: normalized });
  }

  return { matched, discrepancies };
}
