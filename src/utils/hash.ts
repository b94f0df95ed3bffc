import { createHash } from "crypto";

/**
 * Compute SHA256 hash of input bytes or string
 */
export function sha256(input: Uint8Array | string): string {
  const hash = createHash("sha256");
  if (typeof input === "string") {
    hash.update(input, "utf8");
  } else {
    hash.update(input);
  }
  return hash.digest("hex");
}

/**
 * Digest of module bytecode, as reported for every verified module
 */
export function moduleDigest(bytes: Uint8Array): string {
  return sha256(bytes);
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.from(a.buffer, a.byteOffset, a.byteLength).equals(
    Buffer.from(b.buffer, b.byteOffset, b.byteLength)
  );
}
