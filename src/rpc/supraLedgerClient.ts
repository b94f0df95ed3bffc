/**
 * LedgerReadClient backed by the Supra REST RPC.
 * An account holding modules is a package; an account without modules is
 * ordinary data; a missing account is not found.
 */

import { readModuleBinary } from "../bytecode/binaryFormat.js";
import { decodeBytecode } from "../utils/json.js";
import type { Address } from "../utils/validate.js";
import {
  chunkArray,
  PACKAGE_OBJECT_TYPE,
  type LedgerReadClient,
  type LedgerReadOptions,
  type LedgerReadResult,
} from "./ledgerClient.js";
import { accountExistsV3, fetchAccountModulesV3, fetchAccountResourcesV3 } from "./supraAccountsV3.js";
import { LedgerReadError, type RpcClientOptions } from "./supraRpcClient.js";

export interface SupraLedgerClientOptions extends RpcClientOptions {
  maxConcurrency?: number; // default 8
}

export class SupraLedgerClient implements LedgerReadClient {
  private readonly maxConcurrency: number;

  constructor(private readonly options: SupraLedgerClientOptions) {
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? 8);
  }

  async getObjects(addresses: readonly Address[], options: LedgerReadOptions = {}): Promise<LedgerReadResult[]> {
    const results: LedgerReadResult[] = [];
    for (const batch of chunkArray(addresses, this.maxConcurrency)) {
      results.push(...(await Promise.all(batch.map((address) => this.getObject(address, options)))));
    }
    return results;
  }

  async getObject(address: Address, options: LedgerReadOptions = {}): Promise<LedgerReadResult> {
    const rpcOptions: RpcClientOptions = { ...this.options, signal: options.signal ?? this.options.signal };

    if (!(await accountExistsV3(address, rpcOptions))) {
      return { status: "notExists", address, detail: `account ${address} does not exist` };
    }

    const listed = await fetchAccountModulesV3(address, rpcOptions);
    if (listed.length > 0) {
      const modules = new Map<string, Uint8Array>();
      for (const entry of listed) {
        if (!entry.bytecode) {
          throw new LedgerReadError(
            `Module ${entry.name ?? "<unnamed>"} at ${address} was listed without bytecode`,
            this.options.rpcUrl
          );
        }
        const bytes = decodeBytecode(entry.bytecode);
        modules.set(entry.name ?? moduleNameOf(bytes, address, this.options.rpcUrl), bytes);
      }
      return { status: "exists", object: { address, objectType: PACKAGE_OBJECT_TYPE, modules } };
    }

    const resources = await fetchAccountResourcesV3(address, rpcOptions);
    const types = resources.map((resource) => resource.type);
    return {
      status: "exists",
      object: {
        address,
        objectType: types.length > 0 ? `account with resources [${types.join(", ")}]` : "account without modules",
      },
    };
  }
}

function moduleNameOf(bytes: Uint8Array, address: Address, rpcUrl: string): string {
  try {
    return readModuleBinary(bytes).name;
  } catch (error) {
    throw new LedgerReadError(`Unnamed module at ${address} is not a readable Move binary`, rpcUrl, undefined, {
      cause: error,
    });
  }
}
