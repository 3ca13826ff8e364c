// @colloquy/ws - WebSocket server, session transport and Node client.

export { WsSessionTransport, type WsSocket, toBytes, closeReason } from "./transport.ts";
export {
  ConversationServer,
  matchConversationPath,
  type Authenticator,
  type ConversationServerOptions,
  type ListeningAddress,
} from "./server.ts";
export {
  ConversationClient,
  ClientClosedError,
  MessageRejectedError,
  RequestTimeoutError,
  type ConversationClientOptions,
  type MessageHandler,
  type CloseHandler,
} from "./client.ts";
