// Transport abstraction for client sessions.
//
// A session pulls discrete frames from its transport one at a time, so a
// request that must finish before the next one is read simply holds off the
// next `recv()`.

export type TransportFrame =
  | { type: "binary"; data: Uint8Array }
  | { type: "text"; data: string }
  | { type: "ping" }
  | { type: "pong" }
  | { type: "close"; code: number; reason: string };

export interface SessionTransport {
  /**
   * Receive the next frame.
   *
   * Returns null once the connection is gone and nothing more will arrive.
   */
  recv(): Promise<TransportFrame | null>;

  /** Send one binary message. */
  send(payload: Uint8Array): Promise<void>;

  /** Send a keep-alive ping. */
  ping(): Promise<void>;

  /** Close the connection. Safe to call more than once. */
  close(code: number, reason?: string): Promise<void>;
}
