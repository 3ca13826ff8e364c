// Envelope and message body encoding.

import {
  ByteReader,
  CodecError,
  concat,
  encodeI64,
  encodeU16,
  encodeU32,
  encodeU64,
  encodeVarint,
} from "@colloquy/codec";

import { BodyError, EnvelopeError } from "./error.ts";
import {
  type AnyMessage,
  type Envelope,
  KNOWN_FLAGS,
  Kind,
  MESSAGE_FLAGS,
  MESSAGE_KINDS,
  kindFromCode,
  kindName,
} from "./types.ts";

/** Size of the fixed part of the envelope header (cookie, kind, flags). */
export const ENVELOPE_HEADER_SIZE = 12;

/** Fixed part of a NewMessage body: header length, id, user, timestamp. */
const NEW_MESSAGE_HEADER_SIZE = 18;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

// ============================================================================
// Envelope
// ============================================================================

/** Encode an envelope to bytes. */
export function encodeEnvelope(envelope: Envelope): Uint8Array {
  return concat(
    encodeU64(envelope.cookie),
    encodeU16(envelope.kind),
    encodeU16(envelope.flags),
    encodeVarint(envelope.payload.length),
    envelope.payload,
  );
}

/**
 * Parse one envelope occupying the whole of `bytes`.
 *
 * Only the header is checked here; the payload is returned as-is.
 *
 * @throws EnvelopeError when the header is malformed
 */
export function parseEnvelope(bytes: Uint8Array): Envelope {
  if (bytes.length < ENVELOPE_HEADER_SIZE + 1) {
    throw EnvelopeError.underflow(bytes.length);
  }

  const reader = new ByteReader(bytes);
  const cookie = reader.u64();
  const kind = reader.u16();
  const flags = reader.u16();

  if ((flags & ~KNOWN_FLAGS) !== 0) {
    throw EnvelopeError.badFlags(flags);
  }

  let length: number;
  try {
    length = reader.varintNumber();
  } catch (e) {
    if (e instanceof CodecError) {
      if (e.kind === "eof") throw EnvelopeError.underflow(bytes.length);
      throw EnvelopeError.malformedLength();
    }
    throw e;
  }

  if (length !== reader.remaining) {
    throw EnvelopeError.lengthMismatch(length, reader.remaining);
  }

  return { cookie, kind, flags, payload: reader.rest() };
}

// ============================================================================
// Message bodies
// ============================================================================

/** Wrap a message into an envelope with its kind's default flags. */
export function toEnvelope(cookie: bigint, message: AnyMessage): Envelope {
  return {
    cookie,
    kind: MESSAGE_KINDS[message.tag],
    flags: MESSAGE_FLAGS[message.tag],
    payload: encodeBody(message),
  };
}

/** Encode a message into envelope bytes ready for the transport. */
export function buildEnvelope(cookie: bigint, message: AnyMessage): Uint8Array {
  return encodeEnvelope(toEnvelope(cookie, message));
}

export function encodeBody(message: AnyMessage): Uint8Array {
  switch (message.tag) {
    case "Connected":
    case "UnknownEvent":
      return new Uint8Array(0);
    case "NewMessage":
      return concat(
        encodeU16(NEW_MESSAGE_HEADER_SIZE),
        encodeU32(message.id),
        encodeU32(message.user),
        encodeI64(BigInt(Math.floor(message.timestamp.getTime() / 1000))),
        message.message,
      );
    case "SendMessage":
      return message.message;
    case "MessageReceived":
      return encodeU32(message.id);
    case "MessageInvalid":
      return message.message === null ? new Uint8Array(0) : utf8Encoder.encode(message.message);
  }
}

/**
 * Decode the payload of an envelope.
 *
 * Returns null for kinds this implementation does not know.
 *
 * @throws BodyError when a known kind's payload is malformed
 */
export function decodeMessage(envelope: Envelope): AnyMessage | null {
  const kind = kindFromCode(envelope.kind);
  if (kind === null) return null;

  try {
    return decodeBody(kind, envelope.payload);
  } catch (e) {
    if (e instanceof CodecError) {
      throw new BodyError(envelope.kind, `malformed ${kindName(envelope.kind)} body: ${e.message}`);
    }
    throw e;
  }
}

function decodeBody(kind: Kind, payload: Uint8Array): AnyMessage {
  const reader = new ByteReader(payload);

  switch (kind) {
    case Kind.Connected:
      return { tag: "Connected" };
    case Kind.UnknownEvent:
      return { tag: "UnknownEvent" };
    case Kind.SendMessage:
      return { tag: "SendMessage", message: payload };
    case Kind.NewMessage: {
      const headerSize = reader.u16();
      if (headerSize < NEW_MESSAGE_HEADER_SIZE || headerSize > payload.length) {
        throw new BodyError(kind, `NewMessage header size ${headerSize} is invalid`);
      }
      const id = reader.u32();
      const user = reader.u32();
      const seconds = reader.i64();
      // Later revisions may grow the header; skip what we don't know.
      reader.bytes(headerSize - NEW_MESSAGE_HEADER_SIZE);
      return {
        tag: "NewMessage",
        id,
        user,
        timestamp: new Date(Number(seconds) * 1000),
        message: reader.rest(),
      };
    }
    case Kind.MessageReceived:
      return { tag: "MessageReceived", id: reader.u32() };
    case Kind.MessageInvalid: {
      if (payload.length === 0) return { tag: "MessageInvalid", message: null };
      try {
        return { tag: "MessageInvalid", message: utf8Decoder.decode(payload) };
      } catch {
        throw new BodyError(kind, "MessageInvalid diagnostic is not valid UTF-8");
      }
    }
  }
}
