/**
 * Address validation for Move accounts
 */

export type Address = string;

export const ADDRESS_LENGTH = 32;

/**
 * Placeholder address used by packages that have not been published yet
 */
export const ZERO_ADDRESS: Address = `0x${"0".repeat(ADDRESS_LENGTH * 2)}`;

export class InvalidAddressError extends Error {
  constructor(public readonly address: string) {
    super(`Invalid address format: ${address}`);
    this.name = "InvalidAddressError";
  }
}

/**
 * Validate Move address format (0x followed by at most 64 hex digits)
 */
export function isValidAddress(address: string): boolean {
  return /^0x[0-9a-fA-F]{1,64}$/.test(address);
}

/**
 * Canonical form: lowercase, 0x-prefixed, left-padded to 32 bytes
 * @throws InvalidAddressError if the input is not a hex address
 */
export function normalizeAddress(address: string): Address {
  const trimmed = address.trim();
  if (!isValidAddress(trimmed)) {
    throw new InvalidAddressError(address);
  }
  return `0x${trimmed.slice(2).toLowerCase().padStart(ADDRESS_LENGTH * 2, "0")}`;
}

export function isZeroAddress(address: Address): boolean {
  return normalizeAddress(address) === ZERO_ADDRESS;
}

export function addressToBytes(address: Address): Uint8Array {
  return Uint8Array.from(Buffer.from(normalizeAddress(address).slice(2), "hex"));
}

export function addressFromBytes(bytes: Uint8Array): Address {
  if (bytes.length !== ADDRESS_LENGTH) {
    throw new Error(`Address must be ${ADDRESS_LENGTH} bytes, got ${bytes.length}`);
  }
  return `0x${Buffer.from(bytes).toString("hex")}`;
}
