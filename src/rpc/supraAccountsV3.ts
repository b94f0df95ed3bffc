/**
 * Supra MoveVM REST API v3/v2 account endpoints
 * Canonical endpoints: v3-first with v2 fallback
 */

import { rpcFetchWithFallback, LedgerReadError, type RpcClientOptions } from "./supraRpcClient.js";
import { asArray, asStr, isObj } from "../utils/json.js";

export interface SupraModuleV3 {
  name: string | null; // May be missing in list responses
  bytecode: string | null; // Base64 or hex encoded
}

export interface SupraResourceV3 {
  type: string;
}

async function readJson(response: Response, what: string): Promise<unknown> {
  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new LedgerReadError(`Malformed ${what} response: not JSON`, response.url, response.status, { cause: error });
  }

  if (isObj(data) && data.error !== undefined && data.error !== null) {
    const rpcError = data.error;
    const message = isObj(rpcError) ? asStr(rpcError.message) ?? JSON.stringify(rpcError) : String(rpcError);
    throw new LedgerReadError(`RPC error fetching ${what}: ${message}`, response.url, response.status);
  }
  return data;
}

/**
 * Pick the list out of the response shapes seen across deployments:
 * { modules: [...] }, { data: [...] } or a bare array
 */
function listFrom(data: unknown, key: string): unknown[] {
  if (Array.isArray(data)) {
    return data;
  }
  if (isObj(data)) {
    return asArray(data[key] ?? data.data);
  }
  return [];
}

/**
 * Check that an account exists
 * GET /rpc/v3/accounts/{address} (fallback to v2)
 * False when the account does not exist (404)
 */
export async function accountExistsV3(address: string, options: RpcClientOptions): Promise<boolean> {
  const { response } = await rpcFetchWithFallback(address, "", options);
  if (response.status === 404) {
    return false;
  }
  await readJson(response, `account ${address}`);
  return true;
}

export const MAX_MODULE_PAGES = 10;

function pageCursor(data: unknown): string | null {
  if (!isObj(data) || data.has_more !== true) {
    return null;
  }
  return asStr(data.cursor);
}

/**
 * Fetch list of modules for an address, with bytecode, following
 * `cursor`/`has_more` pagination.
 * GET /rpc/v3/accounts/{address}/modules (fallback to v2)
 * @throws LedgerReadError if the list does not end within MAX_MODULE_PAGES
 * pages or a later page is missing
 */
export async function fetchAccountModulesV3(address: string, options: RpcClientOptions): Promise<SupraModuleV3[]> {
  const modules: SupraModuleV3[] = [];
  const seen = new Set<string>();
  let cursor: string | null = null;

  for (let page = 0; page < MAX_MODULE_PAGES; page++) {
    const path: string = cursor ? `/modules?cursor=${encodeURIComponent(cursor)}` : "/modules";
    const { response } = await rpcFetchWithFallback(address, path, options);
    if (response.status === 404) {
      if (page === 0) {
        return [];
      }
      throw new LedgerReadError(`Page ${page + 1} of modules of ${address} was not found`, response.url, 404);
    }

    const data = await readJson(response, `modules of ${address}`);
    for (const module of listFrom(data, "modules").filter(isObj)) {
      const abi = isObj(module.abi) ? module.abi : null;
      const entry: SupraModuleV3 = {
        name: asStr(module.name) ?? (abi ? asStr(abi.name) : null),
        bytecode: asStr(module.bytecode) ?? asStr(module.code),
      };
      // Unnamed entries are kept; their name comes from the binary later
      if (entry.name !== null) {
        if (seen.has(entry.name)) {
          continue;
        }
        seen.add(entry.name);
      }
      modules.push(entry);
    }

    cursor = pageCursor(data);
    if (!cursor) {
      return modules;
    }
  }

  throw new LedgerReadError(
    `Module list of ${address} did not end within ${MAX_MODULE_PAGES} pages`,
    options.rpcUrl
  );
}

/**
 * Fetch resource types held by an address
 * GET /rpc/v3/accounts/{address}/resources (fallback to v2)
 */
export async function fetchAccountResourcesV3(address: string, options: RpcClientOptions): Promise<SupraResourceV3[]> {
  const { response } = await rpcFetchWithFallback(address, "/resources", options);
  if (response.status === 404) {
    return [];
  }

  const data = await readJson(response, `resources of ${address}`);
  const resources: SupraResourceV3[] = [];
  for (const resource of listFrom(data, "resources")) {
    const type = isObj(resource) ? asStr(resource.type) : null;
    if (type) {
      resources.push({ type });
    }
  }
  return resources;
}
