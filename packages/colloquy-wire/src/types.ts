// Colloquy wire protocol types.
//
// Every WebSocket binary message carries exactly one envelope:
// [cookie u64][kind u16][flags u16][varint payload length][payload],
// all fixed-width fields little-endian.

// ============================================================================
// Kinds and flags
// ============================================================================

/**
 * Message kind discriminants.
 *
 * Kinds with the top bit set are responses to a request carrying the same
 * cookie; the rest are events or requests.
 */
export const Kind = {
  /** Sent to a client who just joined a conversation. */
  Connected: 0x0000,
  /** A new message was added to the conversation. */
  NewMessage: 0x0001,
  /** Client asks to add a message to the conversation. */
  SendMessage: 0x0002,
  /** Reply to an envelope whose kind the receiver does not understand. */
  UnknownEvent: 0x8000,
  /** The message was stored; carries its id. */
  MessageReceived: 0x8001,
  /** The message was refused; carries an optional diagnostic. */
  MessageInvalid: 0x8002,
} as const;

export type Kind = (typeof Kind)[keyof typeof Kind];

const KIND_NAMES: Readonly<Record<Kind, string>> = {
  [Kind.Connected]: "Connected",
  [Kind.NewMessage]: "NewMessage",
  [Kind.SendMessage]: "SendMessage",
  [Kind.UnknownEvent]: "UnknownEvent",
  [Kind.MessageReceived]: "MessageReceived",
  [Kind.MessageInvalid]: "MessageInvalid",
};

const KINDS: readonly Kind[] = Object.values(Kind);

export function kindFromCode(code: number): Kind | null {
  return KINDS.find((kind) => kind === code) ?? null;
}

export function kindName(code: number): string {
  const kind = kindFromCode(code);
  return kind === null ? `0x${code.toString(16).padStart(4, "0")}` : KIND_NAMES[kind];
}

/** Is this kind an event or request (as opposed to a response)? */
export function isEvent(kind: number): boolean {
  return (kind & 0x8000) === 0;
}

/** Is this kind a response to an earlier request? */
export function isResponse(kind: number): boolean {
  return (kind & 0x8000) !== 0;
}

/** Envelope flag bits. */
export const Flags = {
  NONE: 0x0000,
  /** The receiver must understand this kind or drop the connection. */
  MUST_PROCESS: 0x0001,
  /** The sender waits for a correlated reply before continuing. */
  RESPONSE_REQUIRED: 0x0002,
} as const;

export const KNOWN_FLAGS = Flags.MUST_PROCESS | Flags.RESPONSE_REQUIRED;

export function hasFlag(flags: number, flag: number): boolean {
  return (flags & flag) === flag;
}

// ============================================================================
// Envelope
// ============================================================================

/** A correlated header-and-payload unit exchanged over the transport. */
export interface Envelope {
  cookie: bigint;
  kind: number;
  flags: number;
  payload: Uint8Array;
}

// ============================================================================
// Message bodies
// ============================================================================

export interface MessageConnected {
  tag: "Connected";
}

/** Broadcast of a stored conversation event. */
export interface MessageNewMessage {
  tag: "NewMessage";
  id: number;
  user: number;
  timestamp: Date;
  message: Uint8Array;
}

export interface MessageSendMessage {
  tag: "SendMessage";
  message: Uint8Array;
}

export interface MessageUnknownEvent {
  tag: "UnknownEvent";
}

export interface MessageReceived {
  tag: "MessageReceived";
  id: number;
}

export interface MessageInvalid {
  tag: "MessageInvalid";
  message: string | null;
}

export type AnyMessage =
  | MessageConnected
  | MessageNewMessage
  | MessageSendMessage
  | MessageUnknownEvent
  | MessageReceived
  | MessageInvalid;

/** Kind code for each message tag. */
export const MESSAGE_KINDS: Readonly<Record<AnyMessage["tag"], Kind>> = {
  Connected: Kind.Connected,
  NewMessage: Kind.NewMessage,
  SendMessage: Kind.SendMessage,
  UnknownEvent: Kind.UnknownEvent,
  MessageReceived: Kind.MessageReceived,
  MessageInvalid: Kind.MessageInvalid,
};

/** Flags each message is sent with by default. */
export const MESSAGE_FLAGS: Readonly<Record<AnyMessage["tag"], number>> = {
  Connected: Flags.NONE,
  NewMessage: Flags.MUST_PROCESS,
  SendMessage: Flags.MUST_PROCESS | Flags.RESPONSE_REQUIRED,
  UnknownEvent: Flags.NONE,
  MessageReceived: Flags.NONE,
  MessageInvalid: Flags.NONE,
};

// ============================================================================
// Factory functions
// ============================================================================

export function connected(): MessageConnected {
  return { tag: "Connected" };
}

export function newMessage(
  id: number,
  user: number,
  timestamp: Date,
  message: Uint8Array,
): MessageNewMessage {
  return { tag: "NewMessage", id, user, timestamp, message };
}

export function sendMessage(message: Uint8Array): MessageSendMessage {
  return { tag: "SendMessage", message };
}

export function unknownEvent(): MessageUnknownEvent {
  return { tag: "UnknownEvent" };
}

export function messageReceived(id: number): MessageReceived {
  return { tag: "MessageReceived", id };
}

export function messageInvalid(message: string | null = null): MessageInvalid {
  return { tag: "MessageInvalid", message };
}
