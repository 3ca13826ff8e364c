// @colloquy/core - conversation broker and client sessions
//
// Transport-agnostic: sessions talk to a SessionTransport, the broker to a
// MessageStore. See @colloquy/ws for the WebSocket server.

// ============================================================================
// Mailboxes
// ============================================================================

export {
  Mailbox,
  MailboxError,
  type MailboxOptions,
  type Recipient,
} from "./mailbox.ts";

// ============================================================================
// Persistence
// ============================================================================

export {
  MemoryMessageStore,
  type ConversationId,
  type UserId,
  type EventId,
  type Event,
  type NewEvent,
  type PersistedEvent,
  type MessageStore,
  type Notification,
  type Notifier,
} from "./store.ts";

// ============================================================================
// Broker
// ============================================================================

export {
  Broker,
  BrokerError,
  type BrokerErrorKind,
  type BrokerOptions,
  type Listener,
  type ConnectRequest,
  type DisconnectRequest,
  type NewMessageRequest,
} from "./broker.ts";

// ============================================================================
// Sessions
// ============================================================================

export type { SessionTransport, TransportFrame } from "./transport.ts";

export {
  ClientSession,
  SessionState,
  DEFAULT_PING_INTERVAL_MS,
  DEFAULT_MAILBOX_CAPACITY,
  type ClientSessionOptions,
} from "./session.ts";

// ============================================================================
// Logging and configuration
// ============================================================================

export {
  type Logger,
  type LogLevel,
  type LoggerOptions,
  LOG_LEVELS,
  isLogLevel,
  createLogger,
  logger,
  configureLogger,
} from "./logging.ts";

export {
  ServerConfigSchema,
  type ServerConfig,
  type ServerConfigInput,
  defaultServerConfig,
  parseServerConfig,
  serverConfigFromEnv,
} from "./config.ts";
