// Correlation cookies.
//
// The top bit of a cookie records which end of the connection issued it, so
// client and server can allocate cookies independently without colliding.

export type CookieOrigin = "client" | "server";

export const SERVER_COOKIE_BIT = 1n << 63n;
const COUNTER_LIMIT = SERVER_COOKIE_BIT;

/** Is this a cookie for a server-sent envelope? */
export function isServerCookie(cookie: bigint): boolean {
  return (cookie & SERVER_COOKIE_BIT) !== 0n;
}

/** Is this a cookie for a client-sent envelope? */
export function isClientCookie(cookie: bigint): boolean {
  return (cookie & SERVER_COOKIE_BIT) === 0n;
}

export function cookieOrigin(cookie: bigint): CookieOrigin {
  return isServerCookie(cookie) ? "server" : "client";
}

/**
 * Allocates cookies for one end of one connection.
 *
 * Values increase monotonically and are never reused; the generator refuses
 * to continue once its 63-bit counter space runs out.
 */
export class CookieGenerator {
  private counter = 0n;
  private readonly originBit: bigint;

  constructor(readonly origin: CookieOrigin) {
    this.originBit = origin === "server" ? SERVER_COOKIE_BIT : 0n;
  }

  next(): bigint {
    if (this.counter >= COUNTER_LIMIT) {
      throw new Error(`${this.origin} cookie space exhausted`);
    }
    const cookie = this.counter | this.originBit;
    this.counter += 1n;
    return cookie;
  }
}
