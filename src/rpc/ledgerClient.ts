/**
 * Read-only ledger boundary used by the resolver
 */

import type { Address } from "../utils/validate.js";

export const PACKAGE_OBJECT_TYPE = "package";

export interface LedgerObject {
  address: Address;
  /** `package` for code, anything else describes ordinary data */
  objectType: string;
  /** Module name to bytecode, present for packages */
  modules?: Map<string, Uint8Array>;
}

export type LedgerReadResult =
  | { status: "exists"; object: LedgerObject }
  | { status: "notExists"; address: Address; detail: string };

export interface LedgerReadOptions {
  signal?: AbortSignal;
}

export interface LedgerReadClient {
  /**
   * One result per requested address, in request order.
   * Rejects (LedgerReadError) on transport failure.
   */
  getObjects(addresses: readonly Address[], options?: LedgerReadOptions): Promise<LedgerReadResult[]>;
}

export function chunkArray<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
