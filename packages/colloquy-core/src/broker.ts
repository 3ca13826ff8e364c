// Conversation broker.
//
// Keeps track of which sessions listen to which conversation, stores new
// messages and fans them out. Every piece of state here is only touched from
// the mailbox handler, so commands are applied one at a time in arrival order.

import { ValidationError, renderText, validate } from "@colloquy/format";

import { type Logger, logger as rootLogger } from "./logging.ts";
import { Mailbox, MailboxError, type Recipient } from "./mailbox.ts";
import type {
  ConversationId,
  Event,
  EventId,
  MessageStore,
  Notifier,
  PersistedEvent,
  UserId,
} from "./store.ts";

/** Event ids travel as u32 in MessageReceived and NewMessage. */
const MAX_EVENT_ID = 0xffff_ffff;

export type BrokerErrorKind = "not-found" | "forbidden" | "persistence" | "closed";

export class BrokerError extends Error {
  constructor(
    public kind: BrokerErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BrokerError";
  }

  static notFound(conversation: ConversationId): BrokerError {
    return new BrokerError("not-found", `conversation ${conversation} does not exist`);
  }

  static forbidden(conversation: ConversationId, user: UserId): BrokerError {
    return new BrokerError(
      "forbidden",
      `user ${user} is not a member of conversation ${conversation}`,
    );
  }

  static persistence(cause: unknown): BrokerError {
    return new BrokerError("persistence", "message store failed", { cause });
  }

  static closed(): BrokerError {
    return new BrokerError("closed", "broker is closed");
  }
}

/** A registered recipient of a conversation's events. */
export interface Listener {
  readonly user: UserId;
  readonly address: Recipient<Event>;
}

export interface ConnectRequest {
  user: UserId;
  conversation: ConversationId;
  address: Recipient<Event>;
}

export interface DisconnectRequest {
  conversation: ConversationId;
  address: Recipient<Event>;
}

export interface NewMessageRequest {
  conversation: ConversationId;
  user: UserId;
  /** Candidate message body, not yet validated. */
  message: Uint8Array;
}

export interface BrokerOptions {
  store: MessageStore;
  /** Told about messages for members with no open session. */
  notifier?: Notifier;
  logger?: Logger;
}

interface Reply<T> {
  resolve(value: T): void;
  reject(error: unknown): void;
}

type BrokerCommand =
  | { kind: "connect"; request: ConnectRequest; reply: Reply<void> }
  | { kind: "disconnect"; request: DisconnectRequest }
  | { kind: "newMessage"; request: NewMessageRequest; reply: Reply<EventId> }
  | { kind: "listenerCounts"; reply: Reply<ReadonlyMap<ConversationId, number>> };

interface ConversationEntry {
  members: readonly UserId[];
  listeners: Listener[];
}

async function settle<T>(reply: Reply<T>, work: () => Promise<T> | T): Promise<void> {
  try {
    reply.resolve(await work());
  } catch (e) {
    reply.reject(e);
  }
}

export class Broker {
  private readonly mailbox: Mailbox<BrokerCommand>;
  private readonly conversations = new Map<ConversationId, ConversationEntry>();
  private readonly store: MessageStore;
  private readonly notifier?: Notifier;
  private readonly logger: Logger;

  constructor(options: BrokerOptions) {
    this.store = options.store;
    this.notifier = options.notifier;
    this.logger = (options.logger ?? rootLogger).child({ component: "broker" });
    this.mailbox = new Mailbox((command) => this.handle(command), {
      onError: (err, command) =>
        this.logger.error({ err, command: command.kind }, "Broker command failed"),
    });
  }

  /**
   * Register `address` as a listener of a conversation.
   *
   * @throws BrokerError "not-found" or "forbidden" when the user may not join
   */
  connect(request: ConnectRequest): Promise<void> {
    return this.call<void>((reply) => ({ kind: "connect", request, reply }));
  }

  /** Remove every registration of `address`. Does not wait. */
  disconnect(request: DisconnectRequest): void {
    try {
      this.mailbox.doSend({ kind: "disconnect", request });
    } catch (e) {
      if (!(e instanceof MailboxError)) throw e;
      this.logger.debug({ conversation: request.conversation }, "Disconnect after broker closed");
    }
  }

  /**
   * Validate, store and broadcast a message.
   *
   * @returns the stored event's id
   * @throws ValidationError when the body is malformed
   * @throws BrokerError "persistence" when the store fails
   */
  newMessage(request: NewMessageRequest): Promise<EventId> {
    return this.call<EventId>((reply) => ({ kind: "newMessage", request, reply }));
  }

  /** Number of registered listeners per conversation. */
  listenerCounts(): Promise<ReadonlyMap<ConversationId, number>> {
    return this.call<ReadonlyMap<ConversationId, number>>((reply) => ({
      kind: "listenerCounts",
      reply,
    }));
  }

  /** Stop accepting commands; queued ones are rejected. */
  close(): void {
    for (const command of this.mailbox.close()) {
      if (command.kind !== "disconnect") command.reply.reject(BrokerError.closed());
    }
    this.conversations.clear();
  }

  private call<T>(build: (reply: Reply<T>) => BrokerCommand): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      try {
        this.mailbox.doSend(build({ resolve, reject }));
      } catch (e) {
        reject(e instanceof MailboxError ? BrokerError.closed() : e);
      }
    });
  }

  private async handle(command: BrokerCommand): Promise<void> {
    switch (command.kind) {
      case "connect":
        return settle(command.reply, () => this.handleConnect(command.request));
      case "disconnect":
        return this.handleDisconnect(command.request);
      case "newMessage":
        return settle(command.reply, () => this.handleNewMessage(command.request));
      case "listenerCounts":
        return settle(command.reply, () => this.counts());
    }
  }

  private async handleConnect({ user, conversation, address }: ConnectRequest): Promise<void> {
    let entry = this.conversations.get(conversation);
    if (!entry) {
      const members = await this.loadMembers(conversation);
      if (members === null) throw BrokerError.notFound(conversation);
      entry = { members, listeners: [] };
    }
    if (!entry.members.includes(user)) {
      throw BrokerError.forbidden(conversation, user);
    }

    entry.listeners.push({ user, address });
    this.conversations.set(conversation, entry);
    this.logger.debug(
      { conversation, user, listeners: entry.listeners.length },
      "Listener connected",
    );
  }

  private handleDisconnect({ conversation, address }: DisconnectRequest): void {
    const entry = this.conversations.get(conversation);
    if (!entry) return;

    entry.listeners = entry.listeners.filter((listener) => listener.address !== address);
    if (entry.listeners.length === 0) {
      this.conversations.delete(conversation);
    }
    this.logger.debug({ conversation, listeners: entry.listeners.length }, "Listener disconnected");
  }

  private async handleNewMessage({ conversation, user, message }: NewMessageRequest): Promise<EventId> {
    const { body, mentions, rest } = validate(message);
    if (rest.length > 0) {
      throw ValidationError.trailingBytes(rest.length);
    }

    let persisted: PersistedEvent;
    try {
      persisted = await this.store.persist({ conversation, user, body, mentions });
    } catch (e) {
      throw BrokerError.persistence(e);
    }
    if (!Number.isInteger(persisted.id) || persisted.id < 0 || persisted.id > MAX_EVENT_ID) {
      const cause = new RangeError(`event id ${persisted.id} does not fit in 32 bits`);
      throw BrokerError.persistence(cause);
    }

    const event: Event = Object.freeze({
      conversation,
      id: persisted.id,
      user,
      timestamp: persisted.timestamp,
      body,
    });

    const entry = this.conversations.get(conversation);
    for (const listener of entry?.listeners ?? []) {
      try {
        listener.address.doSend(event);
      } catch (err) {
        this.logger.warn(
          { err, conversation, user: listener.user },
          "Event delivery failed; disconnecting listener",
        );
        this.disconnect({ conversation, address: listener.address });
      }
    }

    if (this.notifier) {
      const online = new Set<UserId>(entry?.listeners.map((listener) => listener.user));
      void this.notifyOffline(this.notifier, event, entry?.members ?? null, online);
    }

    return event.id;
  }

  private async notifyOffline(
    notifier: Notifier,
    event: Event,
    cached: readonly UserId[] | null,
    online: ReadonlySet<UserId>,
  ): Promise<void> {
    const { conversation, user: author, body } = event;
    try {
      const members = cached ?? (await this.store.members(conversation)) ?? [];
      const text = renderText(body);
      for (const member of members) {
        if (member === author || online.has(member)) continue;
        try {
          await notifier.notify(member, { author, conversation, message: body, text });
        } catch (err) {
          this.logger.warn({ err, conversation, user: member }, "Notification failed");
        }
      }
    } catch (err) {
      this.logger.warn({ err, conversation }, "Could not load members to notify");
    }
  }

  private async loadMembers(conversation: ConversationId): Promise<readonly UserId[] | null> {
    try {
      return await this.store.members(conversation);
    } catch (e) {
      throw BrokerError.persistence(e);
    }
  }

  private counts(): ReadonlyMap<ConversationId, number> {
    const counts = new Map<ConversationId, number>();
    for (const [conversation, entry] of this.conversations) {
      counts.set(conversation, entry.listeners.length);
    }
    return counts;
  }
}
