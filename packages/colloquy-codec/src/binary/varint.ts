// Unsigned LEB128 varints over u64.
//
// Seven bits per byte, least significant group first, 0x80 marks a
// continuation byte.

import { CodecError } from "../error.ts";

export const U64_MAX = (1n << 64n) - 1n;

export function encodeVarint(value: number | bigint): Uint8Array {
  let remaining = typeof value === "bigint" ? value : BigInt(value);
  if (remaining < 0n) throw CodecError.range("negative varint");
  if (remaining > U64_MAX) throw CodecError.range("varint exceeds u64");
  const out: number[] = [];
  do {
    let byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    if (remaining !== 0n) byte |= 0x80;
    out.push(byte);
  } while (remaining !== 0n);
  return Uint8Array.from(out);
}

export function decodeVarint(
  buf: Uint8Array,
  offset: number,
): { value: bigint; next: number } {
  let result = 0n;
  let shift = 0n;
  let i = offset;
  while (true) {
    if (i >= buf.length) throw CodecError.eof("varint");
    const byte = buf[i++];
    const group = BigInt(byte & 0x7f);
    // The tenth byte may only carry bit 63.
    if (shift > 63n || (shift === 63n && group > 1n)) {
      throw CodecError.overflow();
    }
    result |= group << shift;
    if ((byte & 0x80) === 0) return { value: result, next: i };
    shift += 7n;
  }
}

export function decodeVarintNumber(
  buf: Uint8Array,
  offset: number,
): { value: number; next: number } {
  const { value, next } = decodeVarint(buf, offset);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw CodecError.tooLarge(value);
  return { value: Number(value), next };
}
