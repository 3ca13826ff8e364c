// Helpers for writing well-formed message bodies.

import { concat, encodeBytes, encodeU16, encodeVarint } from "@colloquy/codec";

import { FrameType } from "./frame.ts";

const utf8 = new TextEncoder();

/** Encode a single frame from its type code and already-encoded body. */
export function frame(type: number, body: Uint8Array): Uint8Array {
  return concat(encodeVarint(type), encodeVarint(body.length), body);
}

export function message(...paragraphs: Uint8Array[]): Uint8Array {
  return frame(FrameType.Message, concat(...paragraphs));
}

export function paragraph(...inlines: Uint8Array[]): Uint8Array {
  return frame(FrameType.Paragraph, concat(...inlines));
}

export function text(value: string): Uint8Array {
  return frame(FrameType.Text, utf8.encode(value));
}

export function pushFormat(flags: number): Uint8Array {
  return frame(FrameType.PushFormat, encodeU16(flags));
}

export function popFormat(flags: number): Uint8Array {
  return frame(FrameType.PopFormat, encodeU16(flags));
}

/** A null label is encoded as an empty one. */
export function hyperlink(label: string | null, url: string): Uint8Array {
  const encodedLabel = encodeBytes(utf8.encode(label ?? ""));
  return frame(FrameType.Hyperlink, concat(encodedLabel, utf8.encode(url)));
}

export function mention(user: number): Uint8Array {
  return frame(FrameType.Mention, encodeVarint(user));
}

/** A single paragraph of plain text. */
export function plainMessage(value: string): Uint8Array {
  return message(paragraph(text(value)));
}
