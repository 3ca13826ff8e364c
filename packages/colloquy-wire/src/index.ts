// Colloquy wire protocol types and utilities
//
// Envelope framing, message kinds and bodies, correlation cookies and the
// close codes used when a connection has to be dropped.

// ============================================================================
// Wire Types
// ============================================================================

export type {
  Envelope,
  MessageConnected,
  MessageNewMessage,
  MessageSendMessage,
  MessageUnknownEvent,
  MessageReceived,
  MessageInvalid,
  AnyMessage,
} from "./types.ts";

export {
  Kind,
  Flags,
  KNOWN_FLAGS,
  MESSAGE_KINDS,
  MESSAGE_FLAGS,
  kindFromCode,
  kindName,
  isEvent,
  isResponse,
  hasFlag,
  // Factory functions
  connected,
  newMessage,
  sendMessage,
  unknownEvent,
  messageReceived,
  messageInvalid,
} from "./types.ts";

// ============================================================================
// Cookies
// ============================================================================

export {
  type CookieOrigin,
  SERVER_COOKIE_BIT,
  CookieGenerator,
  isServerCookie,
  isClientCookie,
  cookieOrigin,
} from "./cookie.ts";

// ============================================================================
// Errors
// ============================================================================

export { CloseCode, EnvelopeError, BodyError } from "./error.ts";

// ============================================================================
// Wire Codec
// ============================================================================

export {
  ENVELOPE_HEADER_SIZE,
  encodeEnvelope,
  parseEnvelope,
  toEnvelope,
  buildEnvelope,
  encodeBody,
  decodeMessage,
} from "./codec.ts";
