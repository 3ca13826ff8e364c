// Serial message queues.
//
// A component that owns a Mailbox only ever handles one of its messages at a
// time, in the order they were sent. Senders never wait: `doSend` either
// enqueues or throws immediately.

/** Anything messages of type M can be delivered to. */
export interface Recipient<M> {
  /**
   * Enqueue a message without waiting for it to be handled.
   *
   * @throws MailboxError if the recipient is closed or its queue is full
   */
  doSend(message: M): void;
}

/** Delivery to a mailbox failed. */
export class MailboxError extends Error {
  constructor(public kind: "closed" | "full") {
    super(kind === "closed" ? "mailbox is closed" : "mailbox is full");
    this.name = "MailboxError";
  }
}

export interface MailboxOptions<M> {
  /** Maximum number of queued messages. Default: unbounded. */
  capacity?: number;
  /** Hold messages until `resume()` is called. Default: false. */
  paused?: boolean;
  /** Called when the handler throws for a message. */
  onError?: (error: unknown, message: M) => void;
}

export class Mailbox<M> implements Recipient<M> {
  private queue: M[] = [];
  private draining = false;
  private paused: boolean;
  private _closed = false;
  private idleWaiters: (() => void)[] = [];
  private readonly capacity: number;
  private readonly onError?: (error: unknown, message: M) => void;

  constructor(
    private readonly handler: (message: M) => Promise<void> | void,
    options: MailboxOptions<M> = {},
  ) {
    this.capacity = options.capacity ?? Infinity;
    this.paused = options.paused ?? false;
    this.onError = options.onError;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Number of messages waiting to be handled. */
  get size(): number {
    return this.queue.length;
  }

  doSend(message: M): void {
    if (this._closed) throw new MailboxError("closed");
    if (this.queue.length >= this.capacity) throw new MailboxError("full");
    this.queue.push(message);
    this.schedule();
  }

  /** Start handling messages held while paused. */
  resume(): void {
    this.paused = false;
    this.schedule();
  }

  /**
   * Stop accepting messages and discard the queue.
   *
   * A message already being handled runs to completion.
   *
   * @returns the messages that were never handled
   */
  close(): M[] {
    this._closed = true;
    const dropped = this.queue;
    this.queue = [];
    this.notifyIdle();
    return dropped;
  }

  /** Resolves once nothing is queued or being handled. */
  idle(): Promise<void> {
    if (!this.draining && (this.queue.length === 0 || this.paused)) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private schedule(): void {
    if (this.draining || this.paused || this.queue.length === 0) return;
    this.draining = true;
    void this.drain();
  }

  private async drain(): Promise<void> {
    try {
      while (!this.paused && this.queue.length > 0) {
        const message = this.queue.shift();
        if (message === undefined) break;
        try {
          await this.handler(message);
        } catch (e) {
          this.onError?.(e, message);
        }
      }
    } finally {
      this.draining = false;
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    if (this.draining) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
