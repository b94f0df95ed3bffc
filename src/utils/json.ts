// Narrowing helpers for untyped RPC payloads

export function isObj(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

export function asStr(v: unknown): string | null {
  return typeof v === "string" && v.trim().length > 0 ? v : null;
}

export function asArray(v: unknown): unknown[] {
  return Array.isArray(v) ? v : [];
}

/**
 * Decode bytecode that may be hex (with or without 0x) or base64
 */
export function decodeBytecode(encoded: string): Uint8Array {
  const value = encoded.trim();
  if (value.startsWith("0x") || value.startsWith("0X")) {
    return Uint8Array.from(Buffer.from(value.slice(2), "hex"));
  }
  if (value.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(value)) {
    return Uint8Array.from(Buffer.from(value, "hex"));
  }
  return Uint8Array.from(Buffer.from(value, "base64"));
}
