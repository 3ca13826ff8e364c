// Recursive descent validation of message bodies.
//
// Validation never mutates anything outside its own result; a body that fails
// here must not reach persistence.

import { ByteReader, CodecError } from "@colloquy/codec";

import { ValidationError } from "./error.ts";
import { ALLOWED_CHILDREN, FrameType, KNOWN_FORMAT_BITS, isFrameType } from "./frame.ts";

/** Result of validating one candidate message. */
export interface Validation {
  /** User ids mentioned in the message, in encounter order, duplicates kept. */
  readonly mentions: readonly number[];
  /** Bytes of the root Message frame, header included. */
  readonly body: Uint8Array;
  /** Whatever followed the root frame in the input. */
  readonly rest: Uint8Array;
}

interface FrameHeader {
  code: number;
  body: Uint8Array;
}

/** A hyperlink frame; an empty label is no label. */
export interface Link {
  label: string | null;
  url: string;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });
const ascii = new TextDecoder("ascii");

/**
 * Validate a message body.
 *
 * Only the first frame of `input` is examined; any bytes after it are
 * returned as `rest` and it is up to the caller what to do with them.
 *
 * @throws ValidationError when the body breaks the grammar
 */
export function validate(input: Uint8Array): Validation {
  const { root, end } = readRoot(input);

  const mentions: number[] = [];
  validateChildren(FrameType.Message, root, mentions);

  return {
    mentions,
    body: input.subarray(0, end),
    rest: input.subarray(end),
  };
}

/**
 * Read the root Message frame.
 *
 * @returns the root's body and the offset just past it
 */
export function readRoot(input: Uint8Array): { root: Uint8Array; end: number } {
  const reader = new ByteReader(input);
  const root = readFrame(reader);
  if (root.code !== FrameType.Message) {
    throw ValidationError.badRoot(root.code);
  }
  return { root: root.body, end: reader.offset };
}

/**
 * Visit the direct children of a container frame, in order.
 *
 * Children the parent may not hold are rejected before `visit` sees them.
 */
export function eachChild(
  parent: FrameType,
  body: Uint8Array,
  visit: (type: FrameType, body: Uint8Array) => void,
): void {
  const reader = new ByteReader(body);

  while (!reader.done) {
    const frame = readFrame(reader);

    if (!isFrameType(frame.code)) {
      throw ValidationError.unknownFrame(frame.code);
    }
    const type = frame.code;
    if (!ALLOWED_CHILDREN[parent].includes(type)) {
      throw ValidationError.badChild(parent, type);
    }
    visit(type, frame.body);
  }
}

function readFrame(reader: ByteReader): FrameHeader {
  return withCodecErrors(() => {
    const code = reader.varintNumber();
    const length = reader.varintNumber();
    if (length > reader.remaining) {
      throw ValidationError.frameOverflow(length, reader.remaining);
    }
    return { code, body: reader.bytes(length) };
  });
}

function validateChildren(parent: FrameType, body: Uint8Array, mentions: number[]): void {
  eachChild(parent, body, (type, frame) => {
    switch (type) {
      case FrameType.Message:
      case FrameType.Paragraph:
        validateChildren(type, frame, mentions);
        break;
      case FrameType.Text:
        readText(frame);
        break;
      case FrameType.PushFormat:
      case FrameType.PopFormat:
        readFormat(frame);
        break;
      case FrameType.Hyperlink:
        readHyperlink(frame);
        break;
      case FrameType.Mention:
        mentions.push(readMention(frame));
        break;
    }
  });
}

export function readText(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw ValidationError.text();
  }
}

export function readFormat(bytes: Uint8Array): number {
  if (bytes.length !== 2) {
    throw ValidationError.formatLength(bytes.length);
  }
  const bits = bytes[0] | (bytes[1] << 8);
  const unknown = bits & ~KNOWN_FORMAT_BITS;
  if (unknown !== 0) {
    throw ValidationError.unknownFormat(unknown);
  }
  return bits;
}

export function readHyperlink(bytes: Uint8Array): Link {
  const reader = new ByteReader(bytes);
  const label = withCodecErrors(() => {
    const length = reader.varintNumber();
    if (length > reader.remaining) {
      throw ValidationError.frameOverflow(length, reader.remaining);
    }
    return reader.bytes(length);
  });

  const url = reader.rest();
  if (url.some((byte) => byte >= 0x80)) {
    throw ValidationError.nonAsciiUrl();
  }
  return {
    label: label.length === 0 ? null : readText(label),
    url: ascii.decode(url),
  };
}

/** User ids are JavaScript numbers, so ids above 2^53 - 1 are malformed. */
export function readMention(bytes: Uint8Array): number {
  const reader = new ByteReader(bytes);
  const user = withCodecErrors(() => reader.varintNumber());
  if (!reader.done) {
    throw ValidationError.mention();
  }
  return user;
}

function withCodecErrors<T>(fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof CodecError) {
      throw ValidationError.malformed(e.message);
    }
    throw e;
  }
}
