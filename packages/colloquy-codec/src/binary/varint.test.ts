import { describe, expect, it } from "vitest";

import { CodecError } from "../error.ts";
import { ByteReader } from "./reader.ts";
import { concat, encodeI64, encodeU16, encodeU32 } from "./bytes.ts";
import { U64_MAX, decodeVarint, decodeVarintNumber, encodeVarint } from "./varint.ts";

const VECTOR = Uint8Array.from([
  0x02, 0x7f, 0x80, 0x01, 0x81, 0x01, 0x82, 0x01, 0xb9, 0x64, 0xe5, 0x8e, 0x26,
]);
const VECTOR_VALUES = [2n, 127n, 128n, 129n, 130n, 12857n, 624485n];

describe("varint encoding", () => {
  it("encodes small values", () => {
    expect(encodeVarint(0)).toEqual(Uint8Array.of(0x00));
    expect(encodeVarint(1n)).toEqual(Uint8Array.of(0x01));
    expect(encodeVarint(127)).toEqual(Uint8Array.of(0x7f));
  });

  it("encodes multi-byte values", () => {
    expect(encodeVarint(128)).toEqual(Uint8Array.of(0x80, 0x01));
    expect(encodeVarint(300)).toEqual(Uint8Array.of(0xac, 0x02));
    expect(encodeVarint(16384)).toEqual(Uint8Array.of(0x80, 0x80, 0x01));
  });

  it("reproduces the reference byte sequence", () => {
    expect(concat(...VECTOR_VALUES.map((v) => encodeVarint(v)))).toEqual(VECTOR);
  });

  it("encodes u64 max in ten bytes", () => {
    const encoded = encodeVarint(U64_MAX);
    expect(encoded.length).toBe(10);
    expect(encoded[9]).toBe(0x01);
  });

  it("rejects values outside u64", () => {
    expect(() => encodeVarint(-1)).toThrow(CodecError);
    expect(() => encodeVarint(U64_MAX + 1n)).toThrow(CodecError);
  });
});

describe("varint decoding", () => {
  it("decodes the reference byte sequence in order", () => {
    const values: bigint[] = [];
    let offset = 0;
    while (offset < VECTOR.length) {
      const { value, next } = decodeVarint(VECTOR, offset);
      values.push(value);
      offset = next;
    }
    expect(values).toEqual(VECTOR_VALUES);
  });

  it("roundtrips boundary values", () => {
    const values = [0n, 1n, 127n, 128n, 16383n, 16384n, 1n << 32n, (1n << 63n) - 1n, U64_MAX];
    for (const v of values) {
      const encoded = encodeVarint(v);
      expect(decodeVarint(encoded, 0)).toEqual({ value: v, next: encoded.length });
    }
  });

  it("fails with eof when the input ends mid-varint", () => {
    const err = catchCodec(() => decodeVarint(Uint8Array.of(0x80, 0x80), 0));
    expect(err.kind).toBe("eof");
  });

  it("fails with overflow past 64 bits", () => {
    const elevenBytes = Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x80, 0x01);
    expect(catchCodec(() => decodeVarint(elevenBytes, 0)).kind).toBe("overflow");

    const tenthByteTooWide = Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x02);
    expect(catchCodec(() => decodeVarint(tenthByteTooWide, 0)).kind).toBe("overflow");
  });

  it("refuses numbers beyond the safe integer range", () => {
    const encoded = encodeVarint(BigInt(Number.MAX_SAFE_INTEGER) + 1n);
    expect(catchCodec(() => decodeVarintNumber(encoded, 0)).kind).toBe("too-large");
    expect(decodeVarintNumber(encodeVarint(Number.MAX_SAFE_INTEGER), 0).value).toBe(
      Number.MAX_SAFE_INTEGER,
    );
  });
});

describe("ByteReader", () => {
  it("reads mixed varint and fixed-width fields", () => {
    const buf = concat(encodeVarint(300), encodeU16(0xbeef), encodeU32(7), encodeI64(-2n), Uint8Array.of(9, 9));
    const reader = new ByteReader(buf);
    expect(reader.varintNumber()).toBe(300);
    expect(reader.u16()).toBe(0xbeef);
    expect(reader.u32()).toBe(7);
    expect(reader.i64()).toBe(-2n);
    expect(reader.remaining).toBe(2);
    expect(reader.rest()).toEqual(Uint8Array.of(9, 9));
    expect(reader.done).toBe(true);
  });

  it("does not read past its end bound", () => {
    const reader = new ByteReader(Uint8Array.of(1, 2, 3, 4), 1, 3);
    expect(reader.bytes(2)).toEqual(Uint8Array.of(2, 3));
    expect(catchCodec(() => reader.bytes(1)).kind).toBe("eof");
  });

  it("bounds varints by its end as well", () => {
    const reader = new ByteReader(Uint8Array.of(0x80, 0x01), 0, 1);
    expect(catchCodec(() => reader.varint()).kind).toBe("eof");
  });
});

function catchCodec(fn: () => unknown): CodecError {
  try {
    fn();
  } catch (e) {
    if (e instanceof CodecError) return e;
    throw e;
  }
  throw new Error("expected a CodecError");
}
