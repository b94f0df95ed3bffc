#!/usr/bin/env node
// src/cli/verify.ts
// move-verify CLI: thin caller of the source verifier

import { Command } from "commander";
import dotenv from "dotenv";
import fs from "fs";

import { loadConfig } from "../config.js";
import { loadCompiledPackage } from "../core/artifactLoader.js";
import { BytecodeSourceVerifier } from "../core/verifier.js";
import type { SourceMode } from "../core/types.js";
import { readModuleBinary } from "../bytecode/binaryFormat.js";
import { SupraLedgerClient } from "../rpc/supraLedgerClient.js";
import { isValidAddress } from "../utils/validate.js";
import { failuresOf, formatFailure, formatSummary } from "./format.js";

dotenv.config();

interface VerifyCommandOptions {
  address?: string;
  skipRoot?: boolean;
  skipDeps?: boolean;
  rpc?: string;
  collectAll?: boolean;
  json?: boolean;
}

const program = new Command();

program
  .name("move-verify")
  .description("Verify that on-chain Move packages match a local build")
  .version("0.1.0");

program
  .command("verify")
  .description("Verify a Move build directory against the ledger")
  .argument("<buildDir>", "Move build output directory (contains bytecode_modules/)")
  .option("--address <address>", "Verify the root against this address instead of its embedded address")
  .option("--skip-root", "Do not verify the root package")
  .option("--skip-deps", "Do not verify dependencies")
  .option("--rpc <url>", "Supra RPC URL (overrides SUPRA_RPC_URL env)")
  .option("--collect-all", "Report every failure instead of stopping at the first")
  .option("--json", "Print JSON output")
  .action(async (buildDir: string, options: VerifyCommandOptions) => {
    if (options.address && options.skipRoot) {
      console.error("Error: --address and --skip-root cannot be combined");
      process.exitCode = 1;
      return;
    }
    if (options.address && !isValidAddress(options.address.trim())) {
      console.error(`Error: Invalid address format: ${options.address}`);
      process.exitCode = 1;
      return;
    }

    const config = loadConfig();
    const mode: SourceMode = options.address
      ? { kind: "verifyAt", address: options.address.trim() }
      : options.skipRoot
        ? { kind: "skip" }
        : { kind: "verify" };

    const client = new SupraLedgerClient({
      rpcUrl: options.rpc || config.rpcUrl,
      timeout: config.timeout,
      retries: config.retries,
      maxConcurrency: config.maxConcurrency,
    });
    const verifier = new BytecodeSourceVerifier(client, {
      failFast: options.collectAll ? false : config.failFast,
    });

    try {
      const pkg = loadCompiledPackage(buildDir);
      const summary = await verifier.verifyPackage(pkg, !options.skipDeps, mode);
      if (options.json) {
        console.log(JSON.stringify({ ok: true, summary }, null, 2));
      } else {
        console.log(formatSummary(summary));
      }
    } catch (error) {
      const failures = failuresOf(error);
      if (options.json && failures) {
        console.log(JSON.stringify({ ok: false, failures }, null, 2));
      } else {
        console.error(formatFailure(error));
      }
      process.exitCode = 1;
    }
  });

program
  .command("inspect")
  .description("Print the name, address and version of a module binary")
  .argument("<file>", "Module bytecode file (.mv)")
  .action((file: string) => {
    try {
      const binary = readModuleBinary(Uint8Array.from(fs.readFileSync(file)));
      console.log(`Module:  ${binary.name}`);
      console.log(`Address: ${binary.address}`);
      console.log(`Version: ${binary.version}`);
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
