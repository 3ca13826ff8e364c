// Persistence and notification collaborators.
//
// The broker owns none of the ids below; it only passes them between the
// store, the notifier and connected sessions.

export type ConversationId = number;
export type UserId = number;
export type EventId = number;

/** A validated message ready to be stored. */
export interface NewEvent {
  conversation: ConversationId;
  user: UserId;
  /** Bytes of the root Message frame. */
  body: Uint8Array;
  /** Mentioned users, in order, duplicates kept. */
  mentions: readonly UserId[];
}

export interface PersistedEvent {
  id: EventId;
  timestamp: Date;
}

/** A stored conversation event, as broadcast to listeners. */
export interface Event {
  readonly conversation: ConversationId;
  readonly id: EventId;
  readonly user: UserId;
  readonly timestamp: Date;
  readonly body: Uint8Array;
}

export interface MessageStore {
  persist(event: NewEvent): Promise<PersistedEvent>;
  /** Member ids of a conversation, or null if it does not exist. */
  members(conversation: ConversationId): Promise<readonly UserId[] | null>;
}

/** What an offline member is told about a new message. */
export interface Notification {
  author: UserId;
  conversation: ConversationId;
  message: Uint8Array;
  /** The message rendered as plain text. */
  text: string;
}

export interface Notifier {
  notify(user: UserId, notification: Notification): Promise<void>;
}

// ============================================================================
// In-memory store
// ============================================================================

interface StoredConversation {
  members: UserId[];
  events: Event[];
}

/** A MessageStore that keeps everything in process. */
export class MemoryMessageStore implements MessageStore {
  private conversations = new Map<ConversationId, StoredConversation>();
  private nextConversation: ConversationId = 1;
  private nextEvent: EventId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  /** Create a conversation with the given members and return its id. */
  createConversation(members: readonly UserId[]): ConversationId {
    const id = this.nextConversation++;
    this.conversations.set(id, { members: [...members], events: [] });
    return id;
  }

  addMember(conversation: ConversationId, user: UserId): void {
    const stored = this.require(conversation);
    if (!stored.members.includes(user)) stored.members.push(user);
  }

  removeMember(conversation: ConversationId, user: UserId): void {
    const stored = this.require(conversation);
    stored.members = stored.members.filter((member) => member !== user);
  }

  /** Stored events of a conversation, oldest first. */
  events(conversation: ConversationId): readonly Event[] {
    return this.conversations.get(conversation)?.events ?? [];
  }

  async persist(event: NewEvent): Promise<PersistedEvent> {
    const stored = this.require(event.conversation);
    const persisted: Event = Object.freeze({
      conversation: event.conversation,
      id: this.nextEvent++,
      user: event.user,
      timestamp: this.clock(),
      body: event.body.slice(),
    });
    stored.events.push(persisted);
    return { id: persisted.id, timestamp: persisted.timestamp };
  }

  async members(conversation: ConversationId): Promise<readonly UserId[] | null> {
    const stored = this.conversations.get(conversation);
    return stored ? [...stored.members] : null;
  }

  private require(conversation: ConversationId): StoredConversation {
    const stored = this.conversations.get(conversation);
    if (!stored) throw new Error(`conversation ${conversation} does not exist`);
    return stored;
  }
}
