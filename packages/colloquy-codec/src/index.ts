// @colloquy/codec - binary primitives shared by the body grammar and the
// wire envelope.

export { CodecError } from "./error.ts";
export { U64_MAX, encodeVarint, decodeVarint, decodeVarintNumber } from "./binary/varint.ts";
export {
  concat,
  encodeBytes,
  encodeU16,
  encodeU32,
  encodeU64,
  encodeI64,
} from "./binary/bytes.ts";
export { ByteReader } from "./binary/reader.ts";
