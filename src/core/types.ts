/**
 * Core data types for the source verifier
 */

import type { Address } from "../utils/validate.js";

export type { Address };

export interface CompiledModule {
  name: string;
  /** Self address declared in the binary, may be the placeholder */
  address: Address;
  bytes: Uint8Array;
}

export interface CompiledPackage {
  name: string;
  modules: CompiledModule[];
  dependencies: Map<string, CompiledPackage>;
  /** Named address table resolved at compile time */
  addresses: Map<string, Address>;
}

export type OnChainPackageData =
  | { kind: "package"; address: Address; modules: Map<string, Uint8Array> }
  | { kind: "object"; address: Address; description: string }
  | { kind: "notFound"; address: Address; detail: string };

/**
 * Published dependency packages that live at one address, such as several
 * framework packages at 0x1
 */
export interface DependencyAddress {
  address: Address;
  /** One per package name, sorted by name */
  packages: CompiledPackage[];
}

export type SourceMode =
  | { kind: "skip" }
  | { kind: "verify" }
  | { kind: "verifyAt"; address: Address };

export interface VerifiedModule {
  name: string;
  /** Package that declared the module locally */
  packageName: string;
  digest: string;
}

export interface VerifiedPackage {
  address: Address;
  packageName: string;
  role: "root" | "dependency";
  modules: VerifiedModule[];
}

export interface VerificationSummary {
  packages: VerifiedPackage[];
}
