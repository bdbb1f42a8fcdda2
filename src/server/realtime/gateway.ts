import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";

import { WebSocketServer, type WebSocket } from "ws";

import { bindWebSocket, wrapWebSocket } from "@/adapters/realtime/ws/socket";
import { debugLog } from "@/lib/debug";
import type { CredentialResolver } from "@/ports/auth";
import type { ChatService } from "@/server/chat/service";

import { ChatConnection, CLOSE_CODES, type ChatConnectionOptions } from "./connection";
import type { ConnectionRegistry } from "./connection-registry";

export const CHAT_SOCKET_PATH = "/ws/chat";

export type ChatGatewayOptions = ChatConnectionOptions & {
  maxFrameBytes: number;
  path?: string;
};

export type ChatGatewayDependencies = {
  registry: ConnectionRegistry;
  service: ChatService;
  resolver: CredentialResolver;
  options: ChatGatewayOptions;
};

export function extractBearerToken(request: IncomingMessage): string | null {
  const header = request.headers.authorization;
  if (typeof header === "string") {
    const match = /^Bearer\s+(.+)$/i.exec(header.trim());
    if (match?.[1]) return match[1].trim();
  }
  const url = new URL(request.url ?? "/", "http://localhost");
  const token = url.searchParams.get("token");
  return token && token.trim().length ? token.trim() : null;
}

/** Accepts `/ws/chat` upgrades and runs one ChatConnection per socket. */
export class ChatGateway {
  private readonly wss: WebSocketServer;
  private readonly path: string;
  private readonly connections = new Set<ChatConnection>();

  constructor(private readonly deps: ChatGatewayDependencies) {
    this.path = deps.options.path ?? CHAT_SOCKET_PATH;
    this.wss = new WebSocketServer({ noServer: true, maxPayload: deps.options.maxFrameBytes });
  }

  get size(): number {
    return this.connections.size;
  }

  /** Handles an HTTP upgrade. Returns false when the request is not for the chat socket. */
  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): boolean {
    const { pathname } = new URL(request.url ?? "/", "http://localhost");
    if (pathname !== this.path) return false;
    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.accept(ws, extractBearerToken(request));
    });
    return true;
  }

  accept(ws: WebSocket, token: string | null): ChatConnection {
    const connection = new ChatConnection({
      socket: wrapWebSocket(ws),
      registry: this.deps.registry,
      service: this.deps.service,
      resolver: this.deps.resolver,
      options: this.deps.options,
    });
    this.connections.add(connection);
    const opening = connection.open(token);
    bindWebSocket(ws, {
      receive: (raw) => connection.receive(raw),
      handlePong: () => connection.handlePong(),
      handleSocketClosed: () => {
        connection.handleSocketClosed();
        this.connections.delete(connection);
        debugLog("chat.gateway", "closed", connection.id);
      },
    });
    void opening.catch((error: unknown) => {
      console.error("chat.gateway.open_failed", {
        connectionId: connection.id,
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return connection;
  }

  /** Closes every live connection with 1001 and stops accepting upgrades. */
  async close(): Promise<void> {
    this.connections.forEach((connection) => {
      connection.terminate(CLOSE_CODES.goingAway, "server shutting down");
    });
    this.connections.clear();
    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
}
