// Frame table for message bodies.
//
// A body is a tree of frames, each encoded as
// [varint type][varint length][length bytes of body].

/** Frame type discriminants. */
export const FrameType = {
  Message: 0,
  Paragraph: 1,
  Text: 2,
  PushFormat: 3,
  PopFormat: 4,
  Hyperlink: 5,
  Mention: 6,
} as const;

export type FrameType = (typeof FrameType)[keyof typeof FrameType];

/** Inline formatting bits carried by PushFormat and PopFormat. */
export const FormatFlags = {
  NONE: 0x0000,
  EMPHASIS: 0x0001,
  STRONG: 0x0002,
} as const;

export const KNOWN_FORMAT_BITS = FormatFlags.EMPHASIS | FormatFlags.STRONG;

/** Frames each container may hold. Leaves hold nothing. */
export const ALLOWED_CHILDREN: Readonly<Record<FrameType, readonly FrameType[]>> = {
  [FrameType.Message]: [FrameType.Paragraph],
  [FrameType.Paragraph]: [
    FrameType.Text,
    FrameType.PushFormat,
    FrameType.PopFormat,
    FrameType.Hyperlink,
    FrameType.Mention,
  ],
  [FrameType.Text]: [],
  [FrameType.PushFormat]: [],
  [FrameType.PopFormat]: [],
  [FrameType.Hyperlink]: [],
  [FrameType.Mention]: [],
};

const FRAME_NAMES: Readonly<Record<FrameType, string>> = {
  [FrameType.Message]: "Message",
  [FrameType.Paragraph]: "Paragraph",
  [FrameType.Text]: "Text",
  [FrameType.PushFormat]: "PushFormat",
  [FrameType.PopFormat]: "PopFormat",
  [FrameType.Hyperlink]: "Hyperlink",
  [FrameType.Mention]: "Mention",
};

export function isFrameType(code: number): code is FrameType {
  return Object.prototype.hasOwnProperty.call(FRAME_NAMES, code);
}

export function frameName(type: FrameType): string {
  return FRAME_NAMES[type];
}
