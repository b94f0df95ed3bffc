/**
 * Source verification error taxonomy.
 * One class, discriminated by `failure.kind`, so callers can switch on the
 * kind and read structured fields instead of parsing messages.
 */

import type { Address } from "../utils/validate.js";

export type SourceVerificationFailure =
  | { kind: "ZeroOnChainAddressSpecified" }
  | { kind: "InvalidModule"; module: string; reason: string }
  | { kind: "ObjectRefFailure"; address: Address; detail: string }
  | { kind: "ObjectFoundWhenPackageExpected"; address: Address; description: string }
  | { kind: "OnChainDependencyNotFound"; package: string; module: string }
  | { kind: "LocalDependencyNotFound"; address: Address; module: string }
  | { kind: "ModuleBytecodeMismatch"; address: Address; package: string; module: string }
  | { kind: "DependencyObjectReadFailure"; cause: string };

export type SourceVerificationErrorKind = SourceVerificationFailure["kind"];

function describe(failure: SourceVerificationFailure): string {
  switch (failure.kind) {
    case "ZeroOnChainAddressSpecified":
      return "On-chain address cannot be zero";
    case "InvalidModule":
      return `Invalid module ${failure.module}: ${failure.reason}`;
    case "ObjectRefFailure":
      return `Could not read object at ${failure.address}: ${failure.detail}`;
    case "ObjectFoundWhenPackageExpected":
      return `Expected package at ${failure.address}, found ${failure.description}`;
    case "OnChainDependencyNotFound":
      return `On-chain version of dependency ${failure.package}::${failure.module} was not found`;
    case "LocalDependencyNotFound":
      return `Local version of dependency ${failure.address}::${failure.module} was not found`;
    case "ModuleBytecodeMismatch":
      return `Local dependency did not match its on-chain version at ${failure.address}::${failure.package}::${failure.module}`;
    case "DependencyObjectReadFailure":
      return `Dependency object read failure: ${failure.cause}`;
    default: {
      const unreachable: never = failure;
      return String(unreachable);
    }
  }
}

export class SourceVerificationError extends Error {
  constructor(public readonly failure: SourceVerificationFailure, options?: { cause?: unknown }) {
    super(describe(failure), options);
    this.name = "SourceVerificationError";
  }

  get kind(): SourceVerificationErrorKind {
    return this.failure.kind;
  }
}

/**
 * Raised only when collect-all mode finds more than one failure
 */
export class SourceVerificationAggregateError extends AggregateError {
  declare errors: SourceVerificationError[];

  constructor(errors: SourceVerificationError[]) {
    super(errors, `Source verification failed with ${errors.length} errors`);
    this.name = "SourceVerificationAggregateError";
  }
}

export function isSourceVerificationError(error: unknown): error is SourceVerificationError {
  return error instanceof SourceVerificationError;
}
