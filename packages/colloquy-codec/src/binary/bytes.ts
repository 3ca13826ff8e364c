import { CodecError } from "../error.ts";
import { encodeVarint } from "./varint.ts";

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

/** Varint length prefix followed by the bytes themselves. */
export function encodeBytes(bytes: Uint8Array): Uint8Array {
  return concat(encodeVarint(bytes.length), bytes);
}

// Fixed-width little-endian integers.

export function encodeU16(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw CodecError.range(`${value} does not fit in u16`);
  }
  return Uint8Array.of(value & 0xff, value >>> 8);
}

export function encodeU32(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) {
    throw CodecError.range(`${value} does not fit in u32`);
  }
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value, true);
  return out;
}

export function encodeU64(value: bigint): Uint8Array {
  if (value < 0n || value > 0xffff_ffff_ffff_ffffn) {
    throw CodecError.range(`${value} does not fit in u64`);
  }
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, value, true);
  return out;
}

export function encodeI64(value: bigint): Uint8Array {
  if (value < -(1n << 63n) || value >= 1n << 63n) {
    throw CodecError.range(`${value} does not fit in i64`);
  }
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigInt64(0, value, true);
  return out;
}
