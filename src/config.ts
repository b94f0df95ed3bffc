/**
 * Runtime configuration from environment (.env loaded by the CLI)
 */

export const DEFAULT_RPC_URL = "https://rpc-mainnet.supra.com";

export interface VerifierConfig {
  rpcUrl: string;
  timeout: number;
  retries: number;
  maxConcurrency: number;
  failFast: boolean;
}

function intFromEnv(value: string | undefined, fallback: number, min: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): VerifierConfig {
  return {
    rpcUrl: env.SUPRA_RPC_URL?.trim() || DEFAULT_RPC_URL,
    timeout: intFromEnv(env.SUPRA_RPC_TIMEOUT_MS, 10000, 1),
    retries: intFromEnv(env.SUPRA_RPC_RETRIES, 2, 0),
    maxConcurrency: intFromEnv(env.VERIFY_MAX_CONCURRENCY, 8, 1),
    failFast: env.VERIFY_FAIL_FAST !== "0",
  };
}
