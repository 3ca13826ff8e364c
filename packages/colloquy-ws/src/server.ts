// HTTP server accepting conversation sockets.
//
// Upgrades arrive at `{basePath}/conversations/:id/socket`; every accepted
// socket gets its own ClientSession bound to the shared broker.

import { type IncomingMessage, type Server, type ServerResponse, createServer } from "node:http";
import type { Duplex } from "node:stream";

import {
  type Broker,
  ClientSession,
  type ConversationId,
  type Logger,
  type ServerConfig,
  type ServerConfigInput,
  type UserId,
  logger as rootLogger,
  parseServerConfig,
} from "@colloquy/core";
import { CloseCode } from "@colloquy/wire";
import { WebSocketServer } from "ws";

import { type WsSocket, WsSessionTransport } from "./transport.ts";

/**
 * Resolve the user behind an upgrade request.
 *
 * Returning null refuses the upgrade with 401.
 */
export type Authenticator = (
  request: IncomingMessage,
) => Promise<UserId | null> | UserId | null;

export interface ConversationServerOptions {
  broker: Broker;
  authenticate: Authenticator;
  config?: ServerConfigInput;
  logger?: Logger;
}

export interface ListeningAddress {
  host: string;
  port: number;
}

const STATUS_TEXT: Record<number, string> = {
  401: "Unauthorized",
  404: "Not Found",
  500: "Internal Server Error",
};

/**
 * Extract the conversation id from an upgrade path.
 *
 * Returns null unless the path is exactly `{basePath}/conversations/:id/socket`
 * with a decimal id.
 */
export function matchConversationPath(basePath: string, pathname: string): ConversationId | null {
  if (!pathname.startsWith(`${basePath}/`)) return null;
  const match = /^conversations\/(\d+)\/socket$/.exec(pathname.slice(basePath.length + 1));
  if (!match) return null;
  const id = Number(match[1]);
  return Number.isSafeInteger(id) ? id : null;
}

function refuse(socket: Duplex, status: number): void {
  socket.write(`HTTP/1.1 ${status} ${STATUS_TEXT[status] ?? ""}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

export class ConversationServer {
  readonly config: ServerConfig;
  private readonly broker: Broker;
  private readonly authenticate: Authenticator;
  private readonly baseLogger: Logger;
  private readonly logger: Logger;
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly sessions = new Map<ClientSession, WsSessionTransport>();
  private server: Server | null = null;

  constructor(options: ConversationServerOptions) {
    this.config = parseServerConfig(options.config ?? {});
    this.broker = options.broker;
    this.authenticate = options.authenticate;
    this.baseLogger = options.logger ?? rootLogger;
    this.logger = this.baseLogger.child({ component: "server" });
  }

  /** Number of sessions currently running. */
  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Start listening; resolves with the bound address. */
  async listen(): Promise<ListeningAddress> {
    if (this.server) throw new Error("Server is already listening");

    const server = createServer((req, res) => this.handleRequest(req, res));
    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      void this.handleUpgrade(req, socket, head);
    });
    this.server = server;

    const { host, port } = this.config;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    const address = server.address();
    const bound =
      address !== null && typeof address === "object"
        ? { host: address.address, port: address.port }
        : { host, port };
    this.logger.info(bound, "Conversation server listening");
    return bound;
  }

  /** Close every session and stop listening. */
  async close(): Promise<void> {
    for (const transport of this.sessions.values()) {
      await transport.close(CloseCode.GOING_AWAY, "server shutting down");
    }
    this.wss.close();

    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    this.logger.info("Conversation server closed");
  }

  /** Route an upgrade request to a conversation socket. */
  async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    try {
      const url = new URL(req.url ?? "/", "http://localhost");
      const conversation = matchConversationPath(this.config.basePath, url.pathname);
      if (conversation === null) {
        refuse(socket, 404);
        return;
      }

      const user = await this.authenticate(req);
      if (user === null) {
        refuse(socket, 401);
        return;
      }

      this.wss.handleUpgrade(req, socket, head, (ws) => {
        this.accept(ws, conversation, user);
      });
    } catch (err) {
      this.logger.error({ err }, "Upgrade failed");
      refuse(socket, 500);
    }
  }

  /** Start a session on an established WebSocket. */
  accept(socket: WsSocket, conversation: ConversationId, user: UserId): ClientSession {
    const transport = new WsSessionTransport(socket);
    const session = new ClientSession({
      conversation,
      user,
      broker: this.broker,
      transport,
      pingIntervalMs: this.config.pingIntervalMs,
      mailboxCapacity: this.config.mailboxCapacity,
      logger: this.baseLogger,
    });
    this.sessions.set(session, transport);
    this.logger.debug({ conversation, user }, "Socket accepted");

    void session.run().then(() => {
      this.sessions.delete(session);
    });
    return session;
  }

  private handleRequest(_req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(426, { "content-type": "text/plain", connection: "close" });
    res.end("Upgrade Required\n");
  }
}
