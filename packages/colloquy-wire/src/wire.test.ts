import { describe, expect, it } from "vitest";

import { concat, encodeVarint } from "@colloquy/codec";

import {
  ENVELOPE_HEADER_SIZE,
  buildEnvelope,
  decodeMessage,
  encodeEnvelope,
  parseEnvelope,
  toEnvelope,
} from "./codec.ts";
import { SERVER_COOKIE_BIT } from "./cookie.ts";
import { BodyError, CloseCode, EnvelopeError } from "./error.ts";
import {
  type AnyMessage,
  Flags,
  Kind,
  connected,
  isEvent,
  isResponse,
  kindFromCode,
  kindName,
  messageInvalid,
  messageReceived,
  newMessage,
  sendMessage,
  unknownEvent,
} from "./types.ts";

function envelopeError(bytes: Uint8Array): EnvelopeError {
  try {
    parseEnvelope(bytes);
  } catch (e) {
    if (e instanceof EnvelopeError) return e;
    throw e;
  }
  throw new Error("expected an EnvelopeError");
}

describe("wire discriminants", () => {
  it("has the protocol kind codes", () => {
    expect(Kind.Connected).toBe(0x0000);
    expect(Kind.NewMessage).toBe(0x0001);
    expect(Kind.SendMessage).toBe(0x0002);
    expect(Kind.UnknownEvent).toBe(0x8000);
    expect(Kind.MessageReceived).toBe(0x8001);
    expect(Kind.MessageInvalid).toBe(0x8002);
  });

  it("splits events from responses by the top bit", () => {
    expect(isEvent(Kind.SendMessage)).toBe(true);
    expect(isResponse(Kind.SendMessage)).toBe(false);
    expect(isResponse(Kind.MessageInvalid)).toBe(true);
  });

  it("looks kinds up by code", () => {
    expect(kindFromCode(0x8001)).toBe(Kind.MessageReceived);
    expect(kindFromCode(0x0003)).toBeNull();
    expect(kindName(0x0002)).toBe("SendMessage");
    expect(kindName(0x0003)).toBe("0x0003");
  });
});

describe("envelope encoding", () => {
  it("writes the header little-endian with a varint length", () => {
    expect(buildEnvelope(5n, messageReceived(300))).toEqual(
      Uint8Array.of(
        0x05, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
        0x01, 0x80,
        0x00, 0x00,
        0x04,
        0x2c, 0x01, 0x00, 0x00,
      ),
    );
  });

  it("sets the top cookie byte for server cookies", () => {
    expect(buildEnvelope(SERVER_COOKIE_BIT, connected())).toEqual(
      Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 0x80, 0, 0, 0, 0, 0),
    );
  });

  it("applies each kind's default flags", () => {
    expect(toEnvelope(1n, sendMessage(Uint8Array.of(1))).flags).toBe(
      Flags.MUST_PROCESS | Flags.RESPONSE_REQUIRED,
    );
    expect(toEnvelope(1n, newMessage(1, 2, new Date(0), new Uint8Array(0))).flags).toBe(
      Flags.MUST_PROCESS,
    );
    expect(toEnvelope(1n, connected()).flags).toBe(Flags.NONE);
    expect(toEnvelope(1n, unknownEvent()).flags).toBe(Flags.NONE);
  });

  it("roundtrips an envelope with a multi-byte length", () => {
    const envelope = {
      cookie: 0x0123_4567_89ab_cdefn,
      kind: 0x7777,
      flags: Flags.RESPONSE_REQUIRED,
      payload: new Uint8Array(200).fill(0x5a),
    };
    const encoded = encodeEnvelope(envelope);
    expect(encoded.length).toBe(ENVELOPE_HEADER_SIZE + 2 + 200);
    expect(parseEnvelope(encoded)).toEqual(envelope);
  });
});

describe("envelope parsing errors", () => {
  it("rejects envelopes shorter than the header", () => {
    const err = envelopeError(new Uint8Array(ENVELOPE_HEADER_SIZE));
    expect(err.kind).toBe("underflow");
    expect(err.closeCode).toBe(CloseCode.MALFORMED_ENVELOPE);
  });

  it("rejects a truncated length varint as underflow", () => {
    const bytes = concat(new Uint8Array(ENVELOPE_HEADER_SIZE), Uint8Array.of(0x80));
    expect(envelopeError(bytes).kind).toBe("underflow");
  });

  it("rejects an overflowing length varint", () => {
    const bytes = concat(new Uint8Array(ENVELOPE_HEADER_SIZE), new Uint8Array(10).fill(0xff), Uint8Array.of(0x01));
    const err = envelopeError(bytes);
    expect(err.kind).toBe("malformed-length");
    expect(err.closeCode).toBe(CloseCode.MALFORMED_ENVELOPE);
  });

  it("rejects unknown flag bits", () => {
    const bytes = encodeEnvelope({ cookie: 1n, kind: 2, flags: 0x0004, payload: new Uint8Array(0) });
    const err = envelopeError(bytes);
    expect(err.kind).toBe("bad-flags");
    expect(err.closeCode).toBe(CloseCode.BAD_FLAGS);
  });

  it("rejects payloads shorter or longer than declared", () => {
    const header = new Uint8Array(ENVELOPE_HEADER_SIZE);
    const short = envelopeError(concat(header, encodeVarint(3), Uint8Array.of(1, 2)));
    expect(short.kind).toBe("length-mismatch");
    expect(short.message).toBe("payload length 3 does not match 2 bytes received");
    expect(short.closeCode).toBe(CloseCode.LENGTH_MISMATCH);

    const long = envelopeError(concat(header, encodeVarint(1), Uint8Array.of(1, 2)));
    expect(long.kind).toBe("length-mismatch");
  });
});

describe("message bodies", () => {
  it("roundtrips every known message", () => {
    const messages: AnyMessage[] = [
      connected(),
      newMessage(12, 34, new Date("2024-05-01T12:00:00Z"), Uint8Array.of(0, 0)),
      sendMessage(Uint8Array.of(0, 2, 1, 0)),
      unknownEvent(),
      messageReceived(99),
      messageInvalid("Text is not allowed inside Message"),
      messageInvalid(),
    ];

    for (const message of messages) {
      const decoded = decodeMessage(parseEnvelope(buildEnvelope(7n, message)));
      expect(decoded).toEqual(message);
    }
  });

  it("lays out NewMessage with an 18-byte header", () => {
    const payload = toEnvelope(0n, newMessage(1, 2, new Date(3000), Uint8Array.of(0xee))).payload;
    expect(payload).toEqual(
      Uint8Array.of(
        18, 0,
        1, 0, 0, 0,
        2, 0, 0, 0,
        3, 0, 0, 0, 0, 0, 0, 0,
        0xee,
      ),
    );
  });

  it("truncates timestamps to whole seconds", () => {
    const envelope = toEnvelope(0n, newMessage(1, 2, new Date(4_999), new Uint8Array(0)));
    const decoded = decodeMessage(envelope);
    expect(decoded).toEqual(newMessage(1, 2, new Date(4_000), new Uint8Array(0)));
  });

  it("skips NewMessage header bytes it does not know", () => {
    const payload = Uint8Array.of(
      20, 0,
      5, 0, 0, 0,
      6, 0, 0, 0,
      0, 0, 0, 0, 0, 0, 0, 0,
      0xaa, 0xbb,
      0x01,
    );
    const decoded = decodeMessage({ cookie: 0n, kind: Kind.NewMessage, flags: 0, payload });
    expect(decoded).toEqual(newMessage(5, 6, new Date(0), Uint8Array.of(0x01)));
  });

  it("returns null for unknown kinds", () => {
    expect(decodeMessage({ cookie: 0n, kind: 0x0003, flags: 0, payload: new Uint8Array(0) })).toBeNull();
  });

  it("reports malformed known bodies", () => {
    expect(() =>
      decodeMessage({ cookie: 0n, kind: Kind.MessageReceived, flags: 0, payload: Uint8Array.of(1) }),
    ).toThrow(BodyError);
    expect(() =>
      decodeMessage({ cookie: 0n, kind: Kind.NewMessage, flags: 0, payload: Uint8Array.of(4, 0) }),
    ).toThrow(BodyError);
    expect(() =>
      decodeMessage({ cookie: 0n, kind: Kind.MessageInvalid, flags: 0, payload: Uint8Array.of(0xff) }),
    ).toThrow(BodyError);
  });
});
