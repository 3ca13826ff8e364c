// Node client for colloquy conversations.
//
// One client is one WebSocket connected to one conversation. Sent messages
// are correlated with their acknowledgements by client cookie.

import { type EventId, type Logger, logger as rootLogger } from "@colloquy/core";
import {
  type AnyMessage,
  BodyError,
  CloseCode,
  CookieGenerator,
  type Envelope,
  EnvelopeError,
  Flags,
  Kind,
  type MessageNewMessage,
  buildEnvelope,
  decodeMessage,
  hasFlag,
  isResponse,
  isServerCookie,
  kindName,
  parseEnvelope,
  sendMessage,
  unknownEvent,
} from "@colloquy/wire";
import { WebSocket } from "ws";

import { type WsSocket, closeReason, toBytes } from "./transport.ts";

/** The client was closed, or the connection dropped, before an answer arrived. */
export class ClientClosedError extends Error {
  constructor(
    public code: number | null = null,
    public reason = "",
  ) {
    super(
      code === null ? "Client is closed" : `Connection closed (${code}${reason ? `: ${reason}` : ""})`,
    );
    this.name = "ClientClosedError";
  }
}

/** The server refused a message. */
export class MessageRejectedError extends Error {
  constructor(public reason: string | null) {
    super(reason === null ? "Message rejected" : `Message rejected: ${reason}`);
    this.name = "MessageRejectedError";
  }
}

export class RequestTimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`No response within ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export interface ConversationClientOptions {
  /** How long to wait for Connected and for each acknowledgement. Default: 30000 */
  timeoutMs?: number;
  /** Extra headers for the upgrade request, e.g. for authentication. */
  headers?: Record<string, string>;
  logger?: Logger;
}

export type MessageHandler = (message: MessageNewMessage) => void;
export type CloseHandler = (code: number, reason: string) => void;

interface PendingSend {
  resolve: (id: EventId) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class ConversationClient {
  private readonly cookies = new CookieGenerator("client");
  private readonly pending = new Map<bigint, PendingSend>();
  private readonly messageHandlers = new Set<MessageHandler>();
  private readonly closeHandlers = new Set<CloseHandler>();
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly ready: Promise<void>;
  private markReady: (() => void) | null = null;
  private failReady: ((error: Error) => void) | null = null;
  private _connected = false;
  private _closed = false;

  /**
   * Connect to a conversation socket and wait for the server's greeting.
   *
   * @throws ClientClosedError if the server refuses or drops the connection
   * @throws RequestTimeoutError if no greeting arrives in time
   */
  static async connect(
    url: string,
    options: ConversationClientOptions = {},
  ): Promise<ConversationClient> {
    const socket = new WebSocket(url, { headers: options.headers });
    const client = new ConversationClient(socket, options);
    await client.waitConnected();
    return client;
  }

  constructor(
    private readonly socket: WsSocket,
    options: ConversationClientOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = (options.logger ?? rootLogger).child({ component: "client" });
    this.ready = new Promise<void>((resolve, reject) => {
      this.markReady = resolve;
      this.failReady = reject;
    });
    // Nobody may be waiting yet; failures surface through waitConnected().
    void this.ready.catch((err: unknown) => this.logger.debug({ err }, "Connection not established"));

    socket.on("message", (data, isBinary) => {
      if (!isBinary) {
        this.abort(CloseCode.UNSUPPORTED, "text frames are not supported");
        return;
      }
      this.onEnvelope(toBytes(data));
    });
    socket.on("close", (code, reason) => this.handleClose(code, reason.toString("utf8")));
    socket.on("error", (err) => {
      this.logger.warn({ err }, "WebSocket error");
      this.failReady?.(err);
    });
  }

  /** True once the server's Connected greeting has arrived. */
  get connected(): boolean {
    return this._connected;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Resolves once the server has sent Connected. */
  waitConnected(): Promise<void> {
    if (this._connected) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new RequestTimeoutError(this.timeoutMs));
        this.abort(CloseCode.NORMAL, "");
      }, this.timeoutMs);
      this.ready.then(
        () => {
          clearTimeout(timer);
          resolve();
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }

  /**
   * Send a message body to the conversation.
   *
   * @returns the id the server stored the message under
   * @throws MessageRejectedError when the server refuses the body
   */
  sendMessage(body: Uint8Array): Promise<EventId> {
    if (this._closed) return Promise.reject(new ClientClosedError());
    if (!this._connected) return Promise.reject(new Error("Not connected"));

    const cookie = this.cookies.next();
    return new Promise<EventId>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(cookie)) reject(new RequestTimeoutError(this.timeoutMs));
      }, this.timeoutMs);
      this.pending.set(cookie, { resolve, reject, timer });

      this.socket.send(buildEnvelope(cookie, sendMessage(body)), { binary: true }, (err) => {
        if (err) this.settle(cookie)?.reject(err);
      });
    });
  }

  /** Subscribe to messages broadcast to the conversation. Returns an unsubscribe function. */
  onMessage(handler: MessageHandler): () => void {
    this.messageHandlers.add(handler);
    return () => this.messageHandlers.delete(handler);
  }

  onClose(handler: CloseHandler): () => void {
    this.closeHandlers.add(handler);
    return () => this.closeHandlers.delete(handler);
  }

  /** Close the connection. Pending sends fail with ClientClosedError. */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.failPending(new ClientClosedError());
    this.failReady?.(new ClientClosedError());
    this.socket.close(CloseCode.NORMAL);
  }

  private onEnvelope(bytes: Uint8Array): void {
    let envelope: Envelope;
    let message: AnyMessage | null;
    try {
      envelope = parseEnvelope(bytes);
      message = decodeMessage(envelope);
    } catch (e) {
      if (e instanceof EnvelopeError) {
        this.abort(e.closeCode, e.message);
        return;
      }
      if (e instanceof BodyError) {
        this.abort(CloseCode.MALFORMED_ENVELOPE, e.message);
        return;
      }
      this.logger.error({ err: e }, "Failed to decode envelope");
      this.abort(CloseCode.INTERNAL_ERROR, "internal error");
      return;
    }

    if (isResponse(envelope.kind)) {
      if (!isServerCookie(envelope.cookie)) this.onResponse(envelope.cookie, message);
      return;
    }

    if (message === null) {
      this.onUnexpected(envelope);
      return;
    }
    switch (message.tag) {
      case "Connected":
        this._connected = true;
        this.markReady?.();
        return;
      case "NewMessage":
        for (const handler of this.messageHandlers) handler(message);
        return;
      default:
        this.onUnexpected(envelope);
    }
  }

  private onResponse(cookie: bigint, message: AnyMessage | null): void {
    const pending = this.settle(cookie);
    if (!pending) {
      this.logger.debug({ cookie: cookie.toString() }, "Response to unknown request");
      return;
    }
    if (message?.tag === "MessageReceived") {
      pending.resolve(message.id);
    } else if (message?.tag === "MessageInvalid") {
      pending.reject(new MessageRejectedError(message.message));
    } else {
      pending.reject(new MessageRejectedError("server does not support SendMessage"));
    }
  }

  /** An event or request the client does not handle. */
  private onUnexpected(envelope: Envelope): void {
    if (envelope.kind === Kind.UnknownEvent) return;
    if (hasFlag(envelope.flags, Flags.MUST_PROCESS)) {
      this.abort(CloseCode.UNSUPPORTED_KIND, `unsupported kind ${kindName(envelope.kind)}`);
      return;
    }
    this.socket.send(buildEnvelope(envelope.cookie, unknownEvent()), { binary: true }, (err) => {
      if (err) this.logger.debug({ err }, "Failed to answer unknown event");
    });
  }

  private handleClose(code: number, reason: string): void {
    this._closed = true;
    this._connected = false;
    const error = new ClientClosedError(code, reason);
    this.failPending(error);
    this.failReady?.(error);
    for (const handler of this.closeHandlers) handler(code, reason);
  }

  private abort(code: number, reason: string): void {
    if (this._closed) return;
    this.logger.warn({ code, reason }, "Closing connection");
    this._closed = true;
    const error = new ClientClosedError(code, reason);
    this.failPending(error);
    this.failReady?.(error);
    this.socket.close(code, closeReason(reason));
  }

  private settle(cookie: bigint): PendingSend | undefined {
    const pending = this.pending.get(cookie);
    if (!pending) return undefined;
    clearTimeout(pending.timer);
    this.pending.delete(cookie);
    return pending;
  }

  private failPending(error: Error): void {
    for (const cookie of [...this.pending.keys()]) {
      this.settle(cookie)?.reject(error);
    }
  }
}
