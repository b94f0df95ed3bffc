/**
 * Move module binary reader
 * Reads just enough of the table directory to find the module's self handle
 * and the address identifier pool
 */

import { ADDRESS_LENGTH, addressFromBytes, type Address } from "../utils/validate.js";

export const MOVE_MAGIC = Uint8Array.of(0xa1, 0x1c, 0xeb, 0x0b);
export const MIN_BINARY_VERSION = 1;
export const MAX_BINARY_VERSION = 7;
const VERSION_MASK = 0x00ffffff;

export enum TableKind {
  MODULE_HANDLES = 0x1,
  STRUCT_HANDLES = 0x2,
  FUNCTION_HANDLES = 0x3,
  FUNCTION_INST = 0x4,
  SIGNATURES = 0x5,
  CONSTANT_POOL = 0x6,
  IDENTIFIERS = 0x7,
  ADDRESS_IDENTIFIERS = 0x8,
  STRUCT_DEFS = 0xa,
  STRUCT_DEF_INST = 0xb,
  FUNCTION_DEFS = 0xc,
  FIELD_HANDLE = 0xd,
  FIELD_INST = 0xe,
  FRIEND_DECLS = 0xf,
  METADATA = 0x10,
  // Enum support, binary version 7
  VARIANT_FIELD_HANDLES = 0x11,
  VARIANT_FIELD_INST = 0x12,
  STRUCT_VARIANT_HANDLES = 0x13,
  STRUCT_VARIANT_INST = 0x14,
}

const ENUM_TABLES_VERSION = 7;

export interface TableEntry {
  kind: TableKind;
  /** Absolute offset of the table's first byte */
  start: number;
  length: number;
}

export interface ModuleHandle {
  addressIndex: number;
  nameIndex: number;
}

export interface ModuleBinary {
  version: number;
  tables: TableEntry[];
  moduleHandles: ModuleHandle[];
  identifiers: string[];
  addresses: Address[];
  /** Absolute offset of each address identifier, parallel to `addresses` */
  addressOffsets: number[];
  selfHandleIndex: number;
  /** Module name from the self handle */
  name: string;
  /** Declared address from the self handle */
  address: Address;
}

export class BinaryFormatError extends Error {
  constructor(message: string, public readonly offset: number) {
    super(`${message} (at byte ${offset})`);
    this.name = "BinaryFormatError";
  }
}

class Cursor {
  constructor(private readonly bytes: Uint8Array, public position: number, private readonly end: number) {}

  get remaining(): number {
    return this.end - this.position;
  }

  u8(): number {
    if (this.position >= this.end) {
      throw new BinaryFormatError("Unexpected end of binary", this.position);
    }
    const value = this.bytes[this.position];
    this.position += 1;
    return value;
  }

  u32le(): number {
    if (this.remaining < 4) {
      throw new BinaryFormatError("Unexpected end of binary", this.position);
    }
    const view = new DataView(this.bytes.buffer, this.bytes.byteOffset + this.position, 4);
    this.position += 4;
    return view.getUint32(0, true);
  }

  uleb128(): number {
    const startedAt = this.position;
    let value = 0;
    let shift = 0;
    for (;;) {
      const byte = this.u8();
      value += (byte & 0x7f) * 2 ** shift;
      if ((byte & 0x80) === 0) {
        break;
      }
      shift += 7;
      if (shift > 28) {
        throw new BinaryFormatError("ULEB128 value does not fit in u32", startedAt);
      }
    }
    if (value > 0xffffffff) {
      throw new BinaryFormatError("ULEB128 value does not fit in u32", startedAt);
    }
    return value;
  }

  take(length: number): Uint8Array {
    if (this.remaining < length) {
      throw new BinaryFormatError(`Expected ${length} bytes`, this.position);
    }
    const slice = this.bytes.subarray(this.position, this.position + length);
    this.position += length;
    return slice;
  }
}

function readTableDirectory(
  cursor: Cursor,
  total: number,
  version: number
): { tables: TableEntry[]; contentEnd: number } {
  const count = cursor.uleb128();
  const raw: Array<{ kind: number; offset: number; length: number; at: number }> = [];
  for (let i = 0; i < count; i++) {
    const at = cursor.position;
    const kind = cursor.u8();
    const offset = cursor.uleb128();
    const length = cursor.uleb128();
    raw.push({ kind, offset, length, at });
  }

  const contentStart = cursor.position;
  const seen = new Set<number>();
  const tables: TableEntry[] = [];
  for (const entry of raw) {
    if (!(entry.kind in TableKind)) {
      throw new BinaryFormatError(`Unknown table kind 0x${entry.kind.toString(16)}`, entry.at);
    }
    if (entry.kind >= TableKind.VARIANT_FIELD_HANDLES && version < ENUM_TABLES_VERSION) {
      throw new BinaryFormatError(
        `Table kind 0x${entry.kind.toString(16)} requires binary version ${ENUM_TABLES_VERSION}`,
        entry.at
      );
    }
    if (seen.has(entry.kind)) {
      throw new BinaryFormatError(`Duplicate table kind 0x${entry.kind.toString(16)}`, entry.at);
    }
    seen.add(entry.kind);
    const start = contentStart + entry.offset;
    if (start + entry.length > total) {
      throw new BinaryFormatError("Table extends past end of binary", entry.at);
    }
    tables.push({ kind: entry.kind, start, length: entry.length });
  }

  const ordered = [...tables].sort((a, b) => a.start - b.start);
  let contentEnd = contentStart;
  for (const table of ordered) {
    if (table.start < contentEnd) {
      throw new BinaryFormatError(`Table 0x${table.kind.toString(16)} overlaps previous table`, table.start);
    }
    contentEnd = table.start + table.length;
  }

  return { tables, contentEnd };
}

function tableCursor(bytes: Uint8Array, tables: TableEntry[], kind: TableKind): Cursor | null {
  const table = tables.find((t) => t.kind === kind);
  return table ? new Cursor(bytes, table.start, table.start + table.length) : null;
}

function readModuleHandles(cursor: Cursor | null): ModuleHandle[] {
  const handles: ModuleHandle[] = [];
  while (cursor && cursor.remaining > 0) {
    handles.push({ addressIndex: cursor.uleb128(), nameIndex: cursor.uleb128() });
  }
  return handles;
}

function readIdentifiers(cursor: Cursor | null): string[] {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  const identifiers: string[] = [];
  while (cursor && cursor.remaining > 0) {
    const at = cursor.position;
    const length = cursor.uleb128();
    try {
      identifiers.push(decoder.decode(cursor.take(length)));
    } catch (error) {
      if (error instanceof BinaryFormatError) {
        throw error;
      }
      throw new BinaryFormatError("Identifier is not valid UTF-8", at);
    }
  }
  return identifiers;
}

function readAddresses(cursor: Cursor | null): { addresses: Address[]; offsets: number[] } {
  const addresses: Address[] = [];
  const offsets: number[] = [];
  if (!cursor) {
    return { addresses, offsets };
  }
  if (cursor.remaining % ADDRESS_LENGTH !== 0) {
    throw new BinaryFormatError(
      `Address identifier table length is not a multiple of ${ADDRESS_LENGTH}`,
      cursor.position
    );
  }
  while (cursor.remaining > 0) {
    offsets.push(cursor.position);
    addresses.push(addressFromBytes(cursor.take(ADDRESS_LENGTH)));
  }
  return { addresses, offsets };
}

/**
 * Parse the parts of a Move module binary that identify it
 * @throws BinaryFormatError on malformed input
 */
export function readModuleBinary(bytes: Uint8Array): ModuleBinary {
  const cursor = new Cursor(bytes, 0, bytes.length);
  const magic = cursor.take(MOVE_MAGIC.length);
  if (!magic.every((b, i) => b === MOVE_MAGIC[i])) {
    throw new BinaryFormatError("Bad magic, not a Move module binary", 0);
  }

  const version = cursor.u32le() & VERSION_MASK;
  if (version < MIN_BINARY_VERSION || version > MAX_BINARY_VERSION) {
    throw new BinaryFormatError(`Unsupported binary version ${version}`, 4);
  }

  const { tables, contentEnd } = readTableDirectory(cursor, bytes.length, version);
  const moduleHandles = readModuleHandles(tableCursor(bytes, tables, TableKind.MODULE_HANDLES));
  const identifiers = readIdentifiers(tableCursor(bytes, tables, TableKind.IDENTIFIERS));
  const { addresses, offsets } = readAddresses(tableCursor(bytes, tables, TableKind.ADDRESS_IDENTIFIERS));

  let selfHandleIndex = 0;
  if (version >= 5) {
    cursor.position = contentEnd;
    selfHandleIndex = cursor.uleb128();
  }

  const self = moduleHandles[selfHandleIndex];
  if (!self) {
    throw new BinaryFormatError(`Self module handle ${selfHandleIndex} is missing`, contentEnd);
  }
  const name = identifiers[self.nameIndex];
  const address = addresses[self.addressIndex];
  if (name === undefined || address === undefined) {
    throw new BinaryFormatError("Self module handle points outside its tables", contentEnd);
  }

  return {
    version,
    tables,
    moduleHandles,
    identifiers,
    addresses,
    addressOffsets: offsets,
    selfHandleIndex,
    name,
    address,
  };
}
