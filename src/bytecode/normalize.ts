/**
 * Rewrite the placeholder address of a module to the address it is (or will be)
 * published at, so local builds can be compared byte-for-byte with on-chain code.
 */

import { readModuleBinary } from "./binaryFormat.js";
import { addressToBytes, normalizeAddress, type Address } from "../utils/validate.js";

/**
 * Replace every address identifier equal to `placeholder` with `target`.
 * All module, struct and function handles reference addresses through the
 * identifier pool, so this covers the self handle and sibling modules.
 * Returns the input unchanged when nothing matches.
 * @throws BinaryFormatError if `bytes` is not a Move module
 */
export function substituteAddress(bytes: Uint8Array, placeholder: Address, target: Address): Uint8Array {
  const from = normalizeAddress(placeholder);
  const binary = readModuleBinary(bytes);

  const hits = binary.addressOffsets.filter((_, i) => binary.addresses[i] === from);
  if (hits.length === 0) {
    return bytes;
  }

  const replacement = addressToBytes(target);
  const rewritten = Uint8Array.from(bytes);
  for (const offset of hits) {
    rewritten.set(replacement, offset);
  }
  return rewritten;
}
