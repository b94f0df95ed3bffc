import { describe, it, expect } from "vitest";
import { collectDependencies } from "./dependencies.js";
import { createCompiledPackage } from "./compiledPackage.js";
import { SourceVerificationError } from "./errors.js";
import { A_ADDRESS, B_ADDRESS, OTHER_ADDRESS, moduleOf, packageA, packageB } from "../testing/fixtures.js";
import { ZERO_ADDRESS } from "../utils/validate.js";

describe("collectDependencies", () => {
  it("should list published dependencies by address", () => {
    const a = packageA(ZERO_ADDRESS, packageB(B_ADDRESS), B_ADDRESS);
    const closure = collectDependencies(a);

    expect(closure.published.map((d) => [d.packages.map((p) => p.name), d.address])).toEqual([[["b"], B_ADDRESS]]);
    expect(closure.unpublished).toEqual([]);
  });

  it("should separate dependencies that were never published", () => {
    const b = packageB(ZERO_ADDRESS);
    const closure = collectDependencies(packageA(ZERO_ADDRESS, b, ZERO_ADDRESS));

    expect(closure.published).toEqual([]);
    expect(closure.unpublished).toEqual([b]);
  });

  it("should visit a diamond's shared dependency once", () => {
    const sharedLeft = createCompiledPackage("z", [moduleOf({ name: "z", address: OTHER_ADDRESS })]);
    const sharedRight = createCompiledPackage("z", [moduleOf({ name: "z", address: OTHER_ADDRESS })]);
    const x = createCompiledPackage("x", [moduleOf({ name: "x", address: A_ADDRESS })], [sharedLeft]);
    const y = createCompiledPackage("y", [moduleOf({ name: "y", address: B_ADDRESS })], [sharedRight]);
    const root = createCompiledPackage("root", [moduleOf({ name: "root", address: ZERO_ADDRESS })], [y, x]);

    const closure = collectDependencies(root);

    expect(closure.published.map((d) => d.packages.map((p) => p.name))).toEqual([["x"], ["y"], ["z"]]);
    expect(closure.published.find((d) => d.address === OTHER_ADDRESS)?.packages[0]).toBe(sharedLeft);
  });

  it("should terminate on cyclic graphs and never include the root", () => {
    const root = createCompiledPackage("root", [moduleOf({ name: "root", address: A_ADDRESS })]);
    const x = createCompiledPackage("x", [moduleOf({ name: "x", address: B_ADDRESS })]);
    root.dependencies.set("x", x);
    x.dependencies.set("root", root);

    const closure = collectDependencies(root);

    expect(closure.published.map((d) => d.address)).toEqual([B_ADDRESS]);
  });

  it("should use the address table for packages without modules and skip packages with neither", () => {
    const aliasOnly = createCompiledPackage("std", []);
    aliasOnly.addresses.set("std", "0x1");
    const empty = createCompiledPackage("empty", []);
    const root = createCompiledPackage("root", [], [aliasOnly, empty]);

    const closure = collectDependencies(root);

    expect(closure.published.map((d) => [d.packages.map((p) => p.name), d.address])).toEqual([
      [["std"], `0x${"0".repeat(63)}1`],
    ]);
  });

  it("should group packages published at the same address", () => {
    const stdlib = createCompiledPackage("MoveStdlib", [moduleOf({ name: "vector", address: "0x1" })]);
    const framework = createCompiledPackage(
      "SupraFramework",
      [moduleOf({ name: "coin", address: "0x1", uses: [{ address: "0x1", name: "vector" }] })],
      [stdlib]
    );
    const other = createCompiledPackage("Oracle", [moduleOf({ name: "feed", address: B_ADDRESS })]);
    const root = createCompiledPackage("root", [], [framework, other, stdlib]);

    const closure = collectDependencies(root);

    expect(closure.published.map((d) => [d.address, d.packages])).toEqual([
      [`0x${"0".repeat(63)}1`, [stdlib, framework]],
      [B_ADDRESS, [other]],
    ]);
  });

  it("should reject a dependency whose modules disagree on their address", () => {
    const split = createCompiledPackage("split", [
      moduleOf({ name: "first", address: A_ADDRESS }),
      moduleOf({ name: "second", address: B_ADDRESS }),
    ]);
    const root = createCompiledPackage("root", [], [split]);

    let caught: unknown;
    try {
      collectDependencies(root);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SourceVerificationError);
    expect(caught instanceof SourceVerificationError && caught.failure).toEqual({
      kind: "InvalidModule",
      module: "second",
      reason: `declared at ${B_ADDRESS} but package split is at ${A_ADDRESS}`,
    });
  });
});
