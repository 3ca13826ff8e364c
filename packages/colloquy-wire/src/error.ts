// Protocol errors and WebSocket close codes.

/** Close codes used when the server terminates a connection. */
export const CloseCode = {
  NORMAL: 1000,
  /** The server is shutting down. */
  GOING_AWAY: 1001,
  /** Text frames are not part of the protocol. */
  UNSUPPORTED: 1003,
  /** The user may not join the requested conversation. */
  POLICY_VIOLATION: 1008,
  /** Broker or store failure. */
  INTERNAL_ERROR: 1011,
  /** Envelope shorter than its header, or unreadable. */
  MALFORMED_ENVELOPE: 4000,
  /** Unknown kind flagged MUST_PROCESS. */
  UNSUPPORTED_KIND: 4001,
  /** Declared payload length disagrees with the bytes received. */
  LENGTH_MISMATCH: 4002,
  /** Envelope sets flag bits this implementation does not know. */
  BAD_FLAGS: 4004,
} as const;

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];

/**
 * An envelope could not be parsed.
 *
 * Envelope errors are fatal to the connection; `closeCode` says how to end it.
 */
export class EnvelopeError extends Error {
  constructor(
    public kind: "underflow" | "malformed-length" | "length-mismatch" | "bad-flags",
    message: string,
  ) {
    super(message);
    this.name = "EnvelopeError";
  }

  static underflow(length: number): EnvelopeError {
    return new EnvelopeError("underflow", `envelope too short (${length} bytes)`);
  }

  static malformedLength(): EnvelopeError {
    return new EnvelopeError("malformed-length", "payload length is not a valid varint");
  }

  static lengthMismatch(declared: number, available: number): EnvelopeError {
    return new EnvelopeError(
      "length-mismatch",
      `payload length ${declared} does not match ${available} bytes received`,
    );
  }

  static badFlags(flags: number): EnvelopeError {
    return new EnvelopeError(
      "bad-flags",
      `unknown flags 0x${flags.toString(16).padStart(4, "0")}`,
    );
  }

  get closeCode(): CloseCode {
    switch (this.kind) {
      case "underflow":
      case "malformed-length":
        return CloseCode.MALFORMED_ENVELOPE;
      case "length-mismatch":
        return CloseCode.LENGTH_MISMATCH;
      case "bad-flags":
        return CloseCode.BAD_FLAGS;
    }
  }
}

/** The payload of a known kind does not have that kind's layout. */
export class BodyError extends Error {
  constructor(
    public kind: number,
    message: string,
  ) {
    super(message);
    this.name = "BodyError";
  }
}
