/**
 * Supra RPC Client with retry, timeout, and structured error handling
 * Supports v3-first with v2 fallback
 */

export interface RpcClientOptions {
  rpcUrl: string;
  timeout?: number; // milliseconds, default 10000
  retries?: number; // default 2
  retryDelay?: number; // milliseconds, default 500
  signal?: AbortSignal; // caller cancellation, never retried
}

/**
 * Transport-level failure: network error, timeout, or a non-404 HTTP error
 * that survived all retries. Distinct from "object not found".
 */
export class LedgerReadError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LedgerReadError";
  }
}

function debugRpc(message: string): void {
  if (process.env.MOVE_VERIFY_DEBUG_RPC === "1") {
    console.error(`[rpc] ${message}`);
  }
}

/**
 * RPC client wrapper with retry and timeout.
 * Returns 2xx and 404 responses; anything else is retried, then thrown.
 */
export async function rpcFetch(
  endpoint: string,
  options: RpcClientOptions = { rpcUrl: "" }
): Promise<Response> {
  const {
    timeout = 10000,
    retries = 2,
    retryDelay = 500,
    signal,
  } = options;

  let lastError: LedgerReadError | null = null;

  for (let attempt = 0; attempt <= retries; attempt++) {
    if (signal?.aborted) {
      throw new LedgerReadError(`Request aborted: ${endpoint}`, endpoint, undefined, { cause: signal.reason });
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      debugRpc(`GET ${endpoint} (attempt ${attempt + 1}/${retries + 1})`);
      const response = await fetch(endpoint, {
        method: "GET",
        headers: { "Content-Type": "application/json" },
        signal: controller.signal,
      });

      // If successful or 404, return immediately
      if (response.ok || response.status === 404) {
        return response;
      }

      const errorText = await response.text();
      lastError = new LedgerReadError(`HTTP ${response.status}: ${errorText}`, endpoint, response.status);
    } catch (error) {
      if (signal?.aborted) {
        throw new LedgerReadError(`Request aborted: ${endpoint}`, endpoint, undefined, { cause: error });
      }
      // Don't retry on timeout
      if (controller.signal.aborted) {
        throw new LedgerReadError(`Request timed out after ${timeout}ms: ${endpoint}`, endpoint, undefined, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      lastError = new LedgerReadError(message, endpoint, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }

    // Wait before retry
    if (attempt < retries) {
      await new Promise((resolve) => setTimeout(resolve, retryDelay * (attempt + 1)));
    }
  }

  throw lastError ?? new LedgerReadError("RPC fetch failed", endpoint);
}

/**
 * Fetch with v3-first, v2 fallback.
 * A v3 404 or failure falls through to v2; a v2 failure is thrown with both causes.
 * A v2 404 only stands when v3 also answered 404: after a v3 failure it is
 * thrown, so an unreachable node never reads as a missing account.
 */
export async function rpcFetchWithFallback(
  address: string,
  path: string,
  options: RpcClientOptions
): Promise<{ response: Response; version: "v2" | "v3" }> {
  const normalizedUrl = options.rpcUrl.replace(/\/+$/, "");

  // Try v3 first
  const v3Endpoint = `${normalizedUrl}/rpc/v3/accounts/${address}${path}`;
  let v3Error: LedgerReadError | null = null;
  try {
    const response = await rpcFetch(v3Endpoint, options);
    if (response.ok) {
      return { response, version: "v3" };
    }
  } catch (error) {
    if (options.signal?.aborted) {
      throw error;
    }
    v3Error =
      error instanceof LedgerReadError
        ? error
        : new LedgerReadError(String(error), v3Endpoint, undefined, { cause: error });
    debugRpc(`v3 failed, falling back to v2: ${v3Error.message}`);
  }
  const v3Failure = v3Error ? v3Error.message : "404";

  // Fallback to v2
  const v2Endpoint = `${normalizedUrl}/rpc/v2/accounts/${address}${path}`;
  let response: Response;
  try {
    response = await rpcFetch(v2Endpoint, options);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new LedgerReadError(
      `Both v3 and v2 RPC failed: v3: ${v3Failure}; v2: ${errorMessage}`,
      v2Endpoint,
      error instanceof LedgerReadError ? error.status : undefined,
      { cause: error }
    );
  }

  if (response.status === 404 && v3Error) {
    throw new LedgerReadError(
      `Both v3 and v2 RPC failed: v3: ${v3Failure}; v2: HTTP 404`,
      v3Endpoint,
      v3Error.status,
      { cause: v3Error }
    );
  }
  return { response, version: "v2" };
}
