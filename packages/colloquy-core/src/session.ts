// Client session: one per accepted WebSocket connection.
//
// Reads envelopes from the transport, turns SendMessage requests into broker
// calls and pushes broker events back to the peer as NewMessage envelopes.

import { ValidationError } from "@colloquy/format";
import {
  type AnyMessage,
  CloseCode,
  CookieGenerator,
  type Envelope,
  EnvelopeError,
  Flags,
  Kind,
  buildEnvelope,
  connected,
  hasFlag,
  isServerCookie,
  kindName,
  messageInvalid,
  messageReceived,
  newMessage,
  parseEnvelope,
  unknownEvent,
} from "@colloquy/wire";

import { type Broker, BrokerError } from "./broker.ts";
import { type Logger, logger as rootLogger } from "./logging.ts";
import { Mailbox } from "./mailbox.ts";
import type { ConversationId, Event, UserId } from "./store.ts";
import type { SessionTransport, TransportFrame } from "./transport.ts";

export const SessionState = {
  Starting: "starting",
  Active: "active",
  Stopping: "stopping",
  Stopped: "stopped",
} as const;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

export const DEFAULT_PING_INTERVAL_MS = 30_000;
export const DEFAULT_MAILBOX_CAPACITY = 256;

export interface ClientSessionOptions {
  conversation: ConversationId;
  user: UserId;
  broker: Broker;
  transport: SessionTransport;
  /** Keep-alive ping interval. Default: 30 seconds. */
  pingIntervalMs?: number;
  /** Broker events that may wait to be pushed before deliveries fail. Default: 256. */
  mailboxCapacity?: number;
  logger?: Logger;
}

/** Why and how the connection is being closed. */
interface Closing {
  code: number;
  reason: string;
}

const NORMAL_CLOSE: Closing = { code: CloseCode.NORMAL, reason: "" };

export class ClientSession {
  readonly conversation: ConversationId;
  readonly user: UserId;

  private _state: SessionState = SessionState.Starting;
  private readonly broker: Broker;
  private readonly transport: SessionTransport;
  private readonly pingIntervalMs: number;
  private readonly logger: Logger;
  private readonly cookies = new CookieGenerator("server");
  private readonly mailbox: Mailbox<Event>;
  private readonly inFlight = new Set<Promise<void>>();
  private pingTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ClientSessionOptions) {
    this.conversation = options.conversation;
    this.user = options.user;
    this.broker = options.broker;
    this.transport = options.transport;
    this.pingIntervalMs = options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;
    this.logger = (options.logger ?? rootLogger).child({
      component: "session",
      conversation: this.conversation,
      user: this.user,
    });
    // Events pile up here until the Connected envelope has gone out.
    this.mailbox = new Mailbox((event) => this.pushEvent(event), {
      capacity: options.mailboxCapacity ?? DEFAULT_MAILBOX_CAPACITY,
      paused: true,
      onError: (err, event) => this.logger.warn({ err, event: event.id }, "Failed to push event"),
    });
  }

  get state(): SessionState {
    return this._state;
  }

  /**
   * Drive the session until the connection ends.
   *
   * Never rejects; every failure ends in the transport being closed.
   */
  async run(): Promise<void> {
    try {
      await this.broker.connect({
        user: this.user,
        conversation: this.conversation,
        address: this.mailbox,
      });
    } catch (err) {
      this.logger.info({ err }, "Connection refused");
      this._state = SessionState.Stopped;
      this.mailbox.close();
      await this.closeTransport(refusal(err));
      return;
    }

    try {
      await this.push(connected());
    } catch (err) {
      this.logger.warn({ err }, "Failed to send Connected");
      await this.stop({ code: CloseCode.INTERNAL_ERROR, reason: "internal error" });
      return;
    }

    this._state = SessionState.Active;
    this.mailbox.resume();
    this.startPing();
    this.logger.debug("Session active");

    await this.stop(await this.readLoop());
  }

  private async readLoop(): Promise<Closing> {
    while (true) {
      let frame: TransportFrame | null;
      try {
        frame = await this.transport.recv();
      } catch (err) {
        this.logger.warn({ err }, "Transport receive failed");
        return NORMAL_CLOSE;
      }
      if (frame === null) return NORMAL_CLOSE;

      const closing = await this.onFrame(frame);
      if (closing) return closing;
    }
  }

  /** Handle one inbound frame; returns how to close, or null to keep reading. */
  private async onFrame(frame: TransportFrame): Promise<Closing | null> {
    if (frame.type !== "binary") return this.onControlFrame(frame);

    let envelope: Envelope;
    try {
      envelope = parseEnvelope(frame.data);
    } catch (err) {
      if (err instanceof EnvelopeError) {
        this.logger.info({ err }, "Malformed envelope");
        return { code: err.closeCode, reason: err.message };
      }
      this.logger.error({ err }, "Failed to parse envelope");
      return { code: CloseCode.INTERNAL_ERROR, reason: "internal error" };
    }

    if (isServerCookie(envelope.cookie)) {
      // The peer's reply to one of our own pushes.
      this.logger.trace({ kind: kindName(envelope.kind) }, "Ignoring reply");
      return null;
    }

    switch (envelope.kind) {
      case Kind.SendMessage:
        await this.dispatch(envelope, this.handleSendMessage(envelope));
        return null;
      case Kind.UnknownEvent:
        return null;
      default:
        if (hasFlag(envelope.flags, Flags.MUST_PROCESS)) {
          return {
            code: CloseCode.UNSUPPORTED_KIND,
            reason: `unsupported kind ${kindName(envelope.kind)}`,
          };
        }
        await this.dispatch(envelope, this.reply(envelope.cookie, unknownEvent()));
        return null;
    }
  }

  private onControlFrame(frame: Exclude<TransportFrame, { type: "binary" }>): Closing | null {
    switch (frame.type) {
      case "ping":
      case "pong":
        return null;
      case "close":
        this.logger.debug({ code: frame.code, reason: frame.reason }, "Peer closed");
        return NORMAL_CLOSE;
      case "text":
        return { code: CloseCode.UNSUPPORTED, reason: "text frames are not supported" };
    }
  }

  /**
   * Requests flagged RESPONSE_REQUIRED finish before the next frame is read;
   * anything else runs alongside later frames.
   */
  private async dispatch(envelope: Envelope, work: Promise<void>): Promise<void> {
    if (hasFlag(envelope.flags, Flags.RESPONSE_REQUIRED)) {
      await work;
      return;
    }
    this.inFlight.add(work);
    void work.then(() => this.inFlight.delete(work));
  }

  private async handleSendMessage(envelope: Envelope): Promise<void> {
    let response: AnyMessage;
    try {
      const id = await this.broker.newMessage({
        conversation: this.conversation,
        user: this.user,
        message: envelope.payload,
      });
      response = messageReceived(id);
    } catch (err) {
      if (err instanceof ValidationError) {
        this.logger.debug({ err }, "Rejected invalid message");
        response = messageInvalid(err.message);
      } else {
        this.logger.error({ err }, "Failed to add message");
        response = messageInvalid("internal error");
      }
    }
    await this.reply(envelope.cookie, response);
  }

  /**
   * Send a response correlated with a request. Never rejects.
   *
   * A response that cannot be encoded goes out as MessageInvalid instead.
   */
  private async reply(cookie: bigint, message: AnyMessage): Promise<void> {
    let bytes: Uint8Array;
    try {
      bytes = buildEnvelope(cookie, message);
    } catch (err) {
      this.logger.error({ err, response: message.tag }, "Failed to encode response");
      bytes = buildEnvelope(cookie, messageInvalid("internal error"));
    }
    try {
      await this.transport.send(bytes);
    } catch (err) {
      this.logger.warn({ err, response: message.tag }, "Failed to send response");
    }
  }

  /** Send a server-initiated message with a fresh cookie. */
  private async push(message: AnyMessage): Promise<void> {
    await this.transport.send(buildEnvelope(this.cookies.next(), message));
  }

  private async pushEvent(event: Event): Promise<void> {
    await this.push(newMessage(event.id, event.user, event.timestamp, event.body));
  }

  private startPing(): void {
    this.pingTimer = setInterval(() => {
      this.transport.ping().catch((err: unknown) => {
        this.logger.debug({ err }, "Ping failed");
      });
    }, this.pingIntervalMs);
    this.pingTimer.unref();
  }

  private async stop(closing: Closing): Promise<void> {
    this._state = SessionState.Stopping;
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    this.mailbox.close();
    this.broker.disconnect({ conversation: this.conversation, address: this.mailbox });

    // An event already being pushed goes out before the close frame.
    await this.mailbox.idle();
    await Promise.all(this.inFlight);
    await this.closeTransport(closing);
    this._state = SessionState.Stopped;
    this.logger.debug({ code: closing.code }, "Session stopped");
  }

  private async closeTransport({ code, reason }: Closing): Promise<void> {
    try {
      await this.transport.close(code, reason);
    } catch (err) {
      this.logger.debug({ err }, "Transport close failed");
    }
  }
}

function refusal(err: unknown): Closing {
  if (err instanceof BrokerError && (err.kind === "forbidden" || err.kind === "not-found")) {
    return { code: CloseCode.POLICY_VIOLATION, reason: err.message };
  }
  return { code: CloseCode.INTERNAL_ERROR, reason: "internal error" };
}
