/**
 * On-chain package resolver: addresses in, OnChainPackageData out
 */

import { PACKAGE_OBJECT_TYPE, type LedgerReadClient, type LedgerReadResult } from "../rpc/ledgerClient.js";
import { isZeroAddress, normalizeAddress } from "../utils/validate.js";
import { SourceVerificationError } from "./errors.js";
import type { Address, OnChainPackageData } from "./types.js";

export interface ResolveOptions {
  signal?: AbortSignal;
}

function classify(address: Address, result: LedgerReadResult | undefined): OnChainPackageData {
  if (!result) {
    return { kind: "notFound", address, detail: "no result returned for address" };
  }
  switch (result.status) {
    case "notExists":
      return { kind: "notFound", address, detail: result.detail };
    case "exists": {
      const { object } = result;
      if (object.objectType === PACKAGE_OBJECT_TYPE && object.modules) {
        return { kind: "package", address, modules: object.modules };
      }
      return { kind: "object", address, description: object.objectType };
    }
    default: {
      const unreachable: never = result;
      return unreachable;
    }
  }
}

/**
 * Resolve each address through one batched client call.
 * Duplicate addresses are looked up once; the map is keyed by normalized address.
 * @throws SourceVerificationError ZeroOnChainAddressSpecified before any call
 * if an address is the placeholder, DependencyObjectReadFailure if the
 * client fails at the transport level
 */
export async function resolvePackages(
  client: LedgerReadClient,
  addresses: readonly Address[],
  options: ResolveOptions = {}
): Promise<Map<Address, OnChainPackageData>> {
  const unique = [...new Set(addresses.map(normalizeAddress))];
  if (unique.some(isZeroAddress)) {
    throw new SourceVerificationError({ kind: "ZeroOnChainAddressSpecified" });
  }

  const resolved = new Map<Address, OnChainPackageData>();
  if (unique.length === 0) {
    return resolved;
  }

  let results: LedgerReadResult[];
  try {
    results = await client.getObjects(unique, { signal: options.signal });
  } catch (error) {
    const cause = error instanceof Error ? error.message : String(error);
    throw new SourceVerificationError({ kind: "DependencyObjectReadFailure", cause }, { cause: error });
  }

  unique.forEach((address, i) => resolved.set(address, classify(address, results[i])));
  return resolved;
}

/**
 * Turn a non-package resolution into its taxonomy error, or return the modules
 */
export function expectPackage(data: OnChainPackageData): Map<string, Uint8Array> {
  switch (data.kind) {
    case "package":
      return data.modules;
    case "object":
      throw new SourceVerificationError({
        kind: "ObjectFoundWhenPackageExpected",
        address: data.address,
        description: data.description,
      });
    case "notFound":
      throw new SourceVerificationError({ kind: "ObjectRefFailure", address: data.address, detail: data.detail });
    default: {
      const unreachable: never = data;
      return unreachable;
    }
  }
}
