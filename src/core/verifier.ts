/**
 * Bytecode source verifier
 *
 * Checks that a local build of a Move package matches what is published on
 * chain, for the package itself and for its dependency closure. Read-only:
 * every call resolves addresses, compares module bytes, and either returns a
 * summary of what matched or throws a SourceVerificationError.
 */

import { comparePackageModules, type LocalPackageModule, type ModuleDiscrepancy } from "../bytecode/compare.js";
import type { LedgerReadClient } from "../rpc/ledgerClient.js";
import { moduleDigest } from "../utils/hash.js";
import { isZeroAddress, normalizeAddress } from "../utils/validate.js";
import { declaredPackageAddress } from "./compiledPackage.js";
import { collectDependencies } from "./dependencies.js";
import { SourceVerificationAggregateError, SourceVerificationError } from "./errors.js";
import { expectPackage, resolvePackages } from "./resolver.js";
import type {
  Address,
  CompiledPackage,
  OnChainPackageData,
  SourceMode,
  VerificationSummary,
  VerifiedPackage,
} from "./types.js";

export interface VerifierOptions {
  /** Stop at the first failure (default). When false, collect every comparison failure. */
  failFast?: boolean;
  signal?: AbortSignal;
}

export interface VerifyCallOptions {
  signal?: AbortSignal;
}

interface PackagePlan {
  role: VerifiedPackage["role"];
  address: Address;
  /** Local packages reported for this address; the root plan has exactly one */
  packageNames: string[];
  local: LocalPackageModule[];
}

function localModules(pkg: CompiledPackage): LocalPackageModule[] {
  return pkg.modules.map((module) => ({ packageName: pkg.name, module }));
}

export class BytecodeSourceVerifier {
  private readonly failFast: boolean;

  constructor(private readonly client: LedgerReadClient, private readonly options: VerifierOptions = {}) {
    this.failFast = options.failFast ?? true;
  }

  /** Verify published dependencies only; the root is not checked */
  verifyPackageDeps(pkg: CompiledPackage, options?: VerifyCallOptions): Promise<VerificationSummary> {
    return this.verifyPackage(pkg, true, { kind: "skip" }, options);
  }

  /** Verify the root (plus bundled unpublished dependencies) against `address` */
  verifyPackageRoot(pkg: CompiledPackage, address: Address, options?: VerifyCallOptions): Promise<VerificationSummary> {
    return this.verifyPackage(pkg, false, { kind: "verifyAt", address }, options);
  }

  verifyPackageRootAndDeps(
    pkg: CompiledPackage,
    address: Address,
    options?: VerifyCallOptions
  ): Promise<VerificationSummary> {
    return this.verifyPackage(pkg, true, { kind: "verifyAt", address }, options);
  }

  async verifyPackage(
    pkg: CompiledPackage,
    verifyDeps: boolean,
    mode: SourceMode,
    options: VerifyCallOptions = {}
  ): Promise<VerificationSummary> {
    const rootAddress = this.rootAddress(pkg, mode);
    const plans: PackagePlan[] = [];

    if (verifyDeps || rootAddress !== null) {
      const closure = collectDependencies(pkg);

      if (verifyDeps) {
        for (const dep of closure.published) {
          plans.push({
            role: "dependency",
            address: dep.address,
            packageNames: dep.packages.map((p) => p.name),
            local: dep.packages.flatMap(localModules),
          });
        }
      }

      if (rootAddress !== null) {
        plans.push({
          role: "root",
          address: rootAddress,
          packageNames: [pkg.name],
          local: [...localModules(pkg), ...closure.unpublished.flatMap(localModules)],
        });
      }
    }

    if (plans.length === 0) {
      return { packages: [] };
    }

    const resolved = await resolvePackages(
      this.client,
      plans.map((plan) => plan.address),
      { signal: options.signal ?? this.options.signal }
    );

    const failures: SourceVerificationError[] = [];
    const packages: VerifiedPackage[] = [];

    for (const plan of plans) {
      let onChain: Map<string, Uint8Array>;
      try {
        onChain = expectPackage(this.resolvedFor(resolved, plan.address));
      } catch (error) {
        if (this.failFast || !(error instanceof SourceVerificationError)) {
          throw error;
        }
        failures.push(error);
        continue;
      }

      const { matched, discrepancies } = comparePackageModules({
        address: plan.address,
        local: plan.local,
        onChain,
      });

      const errors = discrepancies.map((failure: ModuleDiscrepancy) => new SourceVerificationError(failure));
      const first = errors[0];
      if (first && this.failFast) {
        throw first;
      }
      failures.push(...errors);

      const modules = matched.map((module) => ({
        name: module.name,
        packageName: module.packageName,
        digest: moduleDigest(module.bytes),
      }));
      if (plan.role === "root") {
        // Bundled dependency modules stay under the root they were published with
        packages.push({ address: plan.address, packageName: pkg.name, role: plan.role, modules });
        continue;
      }
      for (const packageName of plan.packageNames) {
        packages.push({
          address: plan.address,
          packageName,
          role: plan.role,
          modules: modules.filter((module) => module.packageName === packageName),
        });
      }
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new SourceVerificationAggregateError(failures);
    }
    return { packages };
  }

  /**
   * Address the root is checked against, or null when the root is skipped.
   * Runs before any lookup so placeholder targets never reach the network.
   */
  private rootAddress(pkg: CompiledPackage, mode: SourceMode): Address | null {
    switch (mode.kind) {
      case "skip":
        return null;
      case "verifyAt": {
        if (isZeroAddress(mode.address)) {
          throw new SourceVerificationError({ kind: "ZeroOnChainAddressSpecified" });
        }
        return normalizeAddress(mode.address);
      }
      case "verify": {
        const declared = declaredPackageAddress(pkg);
        if (!declared.ok) {
          throw new SourceVerificationError({ kind: "InvalidModule", module: declared.module, reason: declared.reason });
        }
        if (declared.address === null) {
          throw new SourceVerificationError({
            kind: "InvalidModule",
            module: pkg.name,
            reason: "package has no modules and no address to verify against",
          });
        }
        if (isZeroAddress(declared.address)) {
          throw new SourceVerificationError({
            kind: "InvalidModule",
            module: pkg.modules[0]?.name ?? pkg.name,
            reason: "self address is the placeholder; the package was never published",
          });
        }
        return declared.address;
      }
      default: {
        const unreachable: never = mode;
        return unreachable;
      }
    }
  }

  private resolvedFor(resolved: Map<Address, OnChainPackageData>, address: Address): OnChainPackageData {
    return resolved.get(address) ?? { kind: "notFound", address, detail: "address was not resolved" };
  }
}
