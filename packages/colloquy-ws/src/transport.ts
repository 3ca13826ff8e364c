// WebSocket transport for client sessions.
//
// Each WebSocket message carries exactly one envelope; WebSocket framing
// already delimits them, so no extra length prefix is added.

import type { SessionTransport, TransportFrame } from "@colloquy/core";
import { type RawData, WebSocket } from "ws";

/** The parts of a `ws` WebSocket the transport and client rely on. */
export interface WsSocket {
  readonly readyState: number;
  send(data: Uint8Array, options: { binary: boolean }, cb?: (err?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "ping" | "pong", listener: (data: Buffer) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

/** Close reasons longer than this do not fit a close frame. */
const MAX_CLOSE_REASON = 123;

export function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

export function closeReason(reason: string): string {
  let trimmed = reason;
  while (Buffer.byteLength(trimmed) > MAX_CLOSE_REASON) trimmed = trimmed.slice(0, -1);
  return trimmed;
}

/**
 * Pull-based adapter over a `ws` WebSocket.
 *
 * Frames arriving while nobody is waiting are queued in order.
 */
export class WsSessionTransport implements SessionTransport {
  private frames: TransportFrame[] = [];
  private waiting: {
    resolve: (frame: TransportFrame | null) => void;
    reject: (err: Error) => void;
  } | null = null;
  private ended = false;
  private error: Error | null = null;

  constructor(private readonly socket: WsSocket) {
    socket.on("message", (data, isBinary) => {
      const bytes = toBytes(data);
      this.push(
        isBinary
          ? { type: "binary", data: bytes }
          : { type: "text", data: Buffer.from(bytes).toString("utf8") },
      );
    });
    socket.on("ping", () => this.push({ type: "ping" }));
    socket.on("pong", () => this.push({ type: "pong" }));
    socket.on("close", (code, reason) => {
      this.push({ type: "close", code, reason: reason.toString("utf8") });
      this.end();
    });
    socket.on("error", (err) => {
      if (this.ended) return;
      this.ended = true;
      const waiting = this.waiting;
      this.waiting = null;
      if (waiting) waiting.reject(err);
      else this.error = err;
    });
  }

  async recv(): Promise<TransportFrame | null> {
    const frame = this.frames.shift();
    if (frame) return frame;

    if (this.error) {
      const err = this.error;
      this.error = null;
      throw err;
    }
    if (this.ended) return null;

    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  send(payload: Uint8Array): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error("WebSocket is not open"));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(payload, { binary: true }, (err) => (err ? reject(err) : resolve()));
    });
  }

  async ping(): Promise<void> {
    if (this.socket.readyState === WebSocket.OPEN) this.socket.ping();
  }

  async close(code: number, reason = ""): Promise<void> {
    const state = this.socket.readyState;
    if (state === WebSocket.CLOSING || state === WebSocket.CLOSED) return;
    this.socket.close(code, closeReason(reason));
  }

  private push(frame: TransportFrame): void {
    if (this.ended) return;
    if (this.waiting) {
      const { resolve } = this.waiting;
      this.waiting = null;
      resolve(frame);
    } else {
      this.frames.push(frame);
    }
  }

  private end(): void {
    if (this.ended) return;
    this.ended = true;
    if (this.waiting) {
      const { resolve } = this.waiting;
      this.waiting = null;
      resolve(null);
    }
  }
}
