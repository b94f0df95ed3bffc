import { describe, it, expect } from "vitest";
import { comparePackageModules, type LocalPackageModule } from "./compare.js";
import { substituteAddress } from "./normalize.js";
import { SourceVerificationError } from "../core/errors.js";
import type { CompiledPackage } from "../core/types.js";
import { A_ADDRESS, B_ADDRESS, packageA, packageB } from "../testing/fixtures.js";
import { ZERO_ADDRESS } from "../utils/validate.js";

function local(pkg: CompiledPackage): LocalPackageModule[] {
  return pkg.modules.map((module) => ({ packageName: pkg.name, module }));
}

function onChain(pkg: CompiledPackage, address: string): Map<string, Uint8Array> {
  return new Map(pkg.modules.map((m) => [m.name, substituteAddress(m.bytes, ZERO_ADDRESS, address)]));
}

describe("comparePackageModules", () => {
  it("should match identical module sets", () => {
    const pkg = packageB(B_ADDRESS);
    const result = comparePackageModules({ address: B_ADDRESS, local: local(pkg), onChain: onChain(pkg, B_ADDRESS) });

    expect(result.discrepancies).toEqual([]);
    expect(result.matched.map((m) => m.name)).toEqual(["b", "c", "d"]);
  });

  it("should normalize placeholder modules against the package address", () => {
    const a = packageA(ZERO_ADDRESS, packageB(B_ADDRESS), B_ADDRESS);
    const result = comparePackageModules({ address: A_ADDRESS, local: local(a), onChain: onChain(a, A_ADDRESS) });

    expect(result.discrepancies).toEqual([]);
    expect(result.matched.map((m) => m.name)).toEqual(["a"]);
  });

  it("should not match placeholder modules when compared against a different address", () => {
    const a = packageA(ZERO_ADDRESS, packageB(B_ADDRESS), B_ADDRESS);
    const result = comparePackageModules({ address: B_ADDRESS, local: local(a), onChain: onChain(a, A_ADDRESS) });

    expect(result.discrepancies).toEqual([
      { kind: "ModuleBytecodeMismatch", address: B_ADDRESS, package: "a", module: "a" },
    ]);
  });

  it("should report each kind of discrepancy in module name order", () => {
    const localPkg = packageB(B_ADDRESS, { omit: ["d"], c: 44n });
    const chainPkg = packageB(B_ADDRESS, { omit: ["b"] });

    const result = comparePackageModules({
      address: B_ADDRESS,
      local: local(localPkg),
      onChain: onChain(chainPkg, B_ADDRESS),
    });

    expect(result.discrepancies).toEqual([
      { kind: "OnChainDependencyNotFound", package: "b", module: "b" },
      { kind: "ModuleBytecodeMismatch", address: B_ADDRESS, package: "b", module: "c" },
      { kind: "LocalDependencyNotFound", address: B_ADDRESS, module: "d" },
    ]);
    expect(result.matched).toEqual([]);
  });

  it("should attribute bundled modules to the package that declared them", () => {
    const bundled = packageB(ZERO_ADDRESS);
    const root = packageA(ZERO_ADDRESS, bundled, ZERO_ADDRESS);
    const published = new Map([
      ...onChain(root, A_ADDRESS),
      ...onChain(packageB(ZERO_ADDRESS, { omit: ["c"] }), A_ADDRESS),
    ]);

    const result = comparePackageModules({
      address: A_ADDRESS,
      local: [...local(root), ...local(bundled)],
      onChain: published,
    });

    expect(result.discrepancies).toEqual([{ kind: "OnChainDependencyNotFound", package: "b", module: "c" }]);
    expect(result.matched.map((m) => `${m.packageName}::${m.name}`)).toEqual(["a::a", "b::b", "b::d"]);
  });

  it("should raise InvalidModule for local bytes that are not a module", () => {
    const broken: LocalPackageModule = {
      packageName: "b",
      module: { name: "x", address: B_ADDRESS, bytes: Uint8Array.of(1, 2, 3) },
    };

    let caught: unknown;
    try {
      comparePackageModules({ address: B_ADDRESS, local: [broken], onChain: new Map([["x", Uint8Array.of(1, 2, 3)]]) });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SourceVerificationError);
    expect(caught instanceof SourceVerificationError && caught.failure).toEqual({
      kind: "InvalidModule",
      module: "x",
      reason: "Expected 4 bytes (at byte 0)",
    });
  });
});
