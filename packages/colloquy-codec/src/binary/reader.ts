import { CodecError } from "../error.ts";
import { decodeVarint, decodeVarintNumber } from "./varint.ts";

/**
 * Forward-only cursor over a byte buffer.
 *
 * Slices returned by {@link ByteReader.bytes} are views into the original
 * buffer, not copies.
 */
export class ByteReader {
  private pos: number;
  private readonly end: number;

  constructor(
    private readonly buf: Uint8Array,
    offset = 0,
    end = buf.length,
  ) {
    this.pos = offset;
    this.end = end;
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.end - this.pos;
  }

  get done(): boolean {
    return this.pos >= this.end;
  }

  varint(): bigint {
    const { value, next } = decodeVarint(this.buf.subarray(0, this.end), this.pos);
    this.pos = next;
    return value;
  }

  varintNumber(): number {
    const { value, next } = decodeVarintNumber(this.buf.subarray(0, this.end), this.pos);
    this.pos = next;
    return value;
  }

  bytes(length: number): Uint8Array {
    if (length > this.remaining) throw CodecError.eof(`${length} bytes`);
    const out = this.buf.subarray(this.pos, this.pos + length);
    this.pos += length;
    return out;
  }

  /** Everything up to the end of the reader. */
  rest(): Uint8Array {
    return this.bytes(this.remaining);
  }

  u16(): number {
    return this.view(2).getUint16(0, true);
  }

  u32(): number {
    return this.view(4).getUint32(0, true);
  }

  u64(): bigint {
    return this.view(8).getBigUint64(0, true);
  }

  i64(): bigint {
    return this.view(8).getBigInt64(0, true);
  }

  private view(length: number): DataView {
    const bytes = this.bytes(length);
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }
}
