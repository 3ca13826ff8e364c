import { describe, expect, it } from "vitest";

import {
  CookieGenerator,
  SERVER_COOKIE_BIT,
  cookieOrigin,
  isClientCookie,
  isServerCookie,
} from "./cookie.ts";

describe("CookieGenerator", () => {
  it("counts up from zero for client cookies", () => {
    const cookies = new CookieGenerator("client");
    expect([cookies.next(), cookies.next(), cookies.next()]).toEqual([0n, 1n, 2n]);
  });

  it("tags server cookies with the top bit", () => {
    const cookies = new CookieGenerator("server");
    const first = cookies.next();
    const second = cookies.next();
    expect(first).toBe(SERVER_COOKIE_BIT);
    expect(second).toBe(SERVER_COOKIE_BIT | 1n);
    expect(isServerCookie(first)).toBe(true);
    expect(isClientCookie(first)).toBe(false);
    expect(cookieOrigin(second)).toBe("server");
  });

  it("keeps client and server ranges disjoint", () => {
    const client = new CookieGenerator("client");
    const server = new CookieGenerator("server");
    const issued = new Set<bigint>();
    for (let i = 0; i < 100; i++) {
      issued.add(client.next());
      issued.add(server.next());
    }
    expect(issued.size).toBe(200);
    expect([...issued].filter(isServerCookie).length).toBe(100);
  });

  it("classifies received cookies", () => {
    expect(isClientCookie(42n)).toBe(true);
    expect(cookieOrigin(42n)).toBe("client");
    expect(cookieOrigin(SERVER_COOKIE_BIT | 42n)).toBe("server");
  });
});
