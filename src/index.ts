export { BytecodeSourceVerifier, type VerifierOptions, type VerifyCallOptions } from "./core/verifier.js";
export {
  SourceVerificationError,
  SourceVerificationAggregateError,
  isSourceVerificationError,
  type SourceVerificationFailure,
  type SourceVerificationErrorKind,
} from "./core/errors.js";
export type {
  Address,
  CompiledModule,
  CompiledPackage,
  DependencyAddress,
  OnChainPackageData,
  SourceMode,
  VerificationSummary,
  VerifiedModule,
  VerifiedPackage,
} from "./core/types.js";
export { compiledModule, createCompiledPackage, declaredPackageAddress } from "./core/compiledPackage.js";
export { collectDependencies, type DependencyClosure } from "./core/dependencies.js";
export { resolvePackages, expectPackage } from "./core/resolver.js";
export { loadCompiledPackage, loadModulesFromDir, ArtifactLoadError } from "./core/artifactLoader.js";
export { comparePackageModules, type PackageComparison, type ModuleDiscrepancy } from "./bytecode/compare.js";
export { substituteAddress } from "./bytecode/normalize.js";
export { readModuleBinary, BinaryFormatError, TableKind, type ModuleBinary } from "./bytecode/binaryFormat.js";
export {
  PACKAGE_OBJECT_TYPE,
  type LedgerReadClient,
  type LedgerReadResult,
  type LedgerObject,
  type LedgerReadOptions,
} from "./rpc/ledgerClient.js";
export { SupraLedgerClient, type SupraLedgerClientOptions } from "./rpc/supraLedgerClient.js";
export { LedgerReadError, type RpcClientOptions } from "./rpc/supraRpcClient.js";
export { loadConfig, type VerifierConfig } from "./config.js";
export { ZERO_ADDRESS, InvalidAddressError, normalizeAddress, isZeroAddress } from "./utils/validate.js";
