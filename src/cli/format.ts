/**
 * Human-readable and JSON output for verification results
 */

import { SourceVerificationAggregateError, SourceVerificationError, type SourceVerificationFailure } from "../core/errors.js";
import type { VerificationSummary } from "../core/types.js";

function shortDigest(digest: string): string {
  return digest.slice(0, 16);
}

/**
 * Format a successful verification
 */
export function formatSummary(summary: VerificationSummary): string {
  if (summary.packages.length === 0) {
    return "Nothing to verify.";
  }

  const lines: string[] = [];
  for (const pkg of summary.packages) {
    lines.push(`[${pkg.role.toUpperCase()}] ${pkg.packageName} @ ${pkg.address}`);
    for (const module of pkg.modules) {
      const origin = module.packageName === pkg.packageName ? "" : ` (bundled from ${module.packageName})`;
      lines.push(`  OK ${module.name} sha256:${shortDigest(module.digest)}${origin}`);
    }
  }

  const moduleCount = summary.packages.reduce((sum, pkg) => sum + pkg.modules.length, 0);
  lines.push("");
  lines.push(`Verified ${moduleCount} module(s) in ${summary.packages.length} package(s).`);
  return lines.join("\n");
}

/**
 * Structured failures carried by a verification error, or null for other errors
 */
export function failuresOf(error: unknown): SourceVerificationFailure[] | null {
  if (error instanceof SourceVerificationAggregateError) {
    return error.errors.map((e) => e.failure);
  }
  if (error instanceof SourceVerificationError) {
    return [error.failure];
  }
  return null;
}

/**
 * Format a failed verification
 */
export function formatFailure(error: unknown): string {
  if (error instanceof SourceVerificationAggregateError) {
    const lines = [`Verification failed (${error.errors.length} errors):`];
    for (const e of error.errors) {
      lines.push(`  [${e.kind}] ${e.message}`);
    }
    return lines.join("\n");
  }
  if (error instanceof SourceVerificationError) {
    return `Verification failed:\n  [${error.kind}] ${error.message}`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}
