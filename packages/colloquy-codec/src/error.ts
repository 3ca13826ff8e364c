/** Error raised while reading or writing binary primitives. */
export class CodecError extends Error {
  constructor(
    public kind: "eof" | "overflow" | "too-large" | "range",
    message: string,
  ) {
    super(message);
    this.name = "CodecError";
  }

  static eof(what: string): CodecError {
    return new CodecError("eof", `unexpected end of input reading ${what}`);
  }

  static overflow(): CodecError {
    return new CodecError("overflow", "varint overflows 64 bits");
  }

  static tooLarge(value: bigint): CodecError {
    return new CodecError("too-large", `value ${value} exceeds the safe integer range`);
  }

  static range(message: string): CodecError {
    return new CodecError("range", message);
  }
}
