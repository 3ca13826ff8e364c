import { type FrameType, frameName } from "./frame.ts";

export type ValidationErrorKind =
  | "frame-overflow"
  | "bad-root"
  | "bad-child"
  | "unknown-frame"
  | "text"
  | "unknown-format"
  | "format-length"
  | "non-ascii-url"
  | "mention"
  | "malformed"
  | "trailing-bytes";

/**
 * A message body violated the frame grammar.
 *
 * The message text is what a client sees in MessageInvalid, so it names
 * frames rather than numeric codes where it can.
 */
export class ValidationError extends Error {
  /** Containing frame, for bad-child. */
  parent?: FrameType;
  /** Offending frame, for bad-root and bad-child. */
  child?: FrameType;
  /** Raw frame code, for unknown-frame and bad-root. */
  code?: number;
  /** Unrecognised format bits, for unknown-format. */
  bits?: number;

  constructor(
    public kind: ValidationErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }

  static frameOverflow(declared: number, available: number): ValidationError {
    return new ValidationError(
      "frame-overflow",
      `frame declares ${declared} bytes but only ${available} remain`,
    );
  }

  static badRoot(code: number): ValidationError {
    const err = new ValidationError("bad-root", `root frame must be Message, got type ${code}`);
    err.code = code;
    return err;
  }

  static badChild(parent: FrameType, child: FrameType): ValidationError {
    const err = new ValidationError(
      "bad-child",
      `${frameName(child)} is not allowed inside ${frameName(parent)}`,
    );
    err.parent = parent;
    err.child = child;
    return err;
  }

  static unknownFrame(code: number): ValidationError {
    const err = new ValidationError("unknown-frame", `unknown frame type ${code}`);
    err.code = code;
    return err;
  }

  static text(): ValidationError {
    return new ValidationError("text", "text is not valid UTF-8");
  }

  static unknownFormat(bits: number): ValidationError {
    const err = new ValidationError(
      "unknown-format",
      `unknown format bits 0x${bits.toString(16).padStart(4, "0")}`,
    );
    err.bits = bits;
    return err;
  }

  static formatLength(length: number): ValidationError {
    return new ValidationError("format-length", `format frame must be 2 bytes, got ${length}`);
  }

  static nonAsciiUrl(): ValidationError {
    return new ValidationError("non-ascii-url", "hyperlink URL is not ASCII");
  }

  static mention(): ValidationError {
    return new ValidationError("mention", "mention must hold exactly one user id");
  }

  static malformed(detail: string): ValidationError {
    return new ValidationError("malformed", `malformed frame: ${detail}`);
  }

  static trailingBytes(count: number): ValidationError {
    return new ValidationError("trailing-bytes", `${count} bytes follow the message`);
  }
}
