import WebSocket, { type RawData } from "ws";

import type { RealtimeSocket } from "@/ports/realtime";

export type SocketEventSink = {
  receive(raw: string): void;
  handlePong(): void;
  handleSocketClosed(): void;
};

function decodeFrame(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

class WsRealtimeSocket implements RealtimeSocket {
  constructor(private readonly socket: WebSocket) {}

  send(data: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error(`Socket is not open (state ${this.socket.readyState}).`));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(data, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.CLOSED || this.socket.readyState === WebSocket.CLOSING) {
      return;
    }
    this.socket.close(code, reason);
  }

  ping(): void {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.ping();
    }
  }

  bufferedAmount(): number {
    return this.socket.bufferedAmount;
  }
}

export function wrapWebSocket(socket: WebSocket): RealtimeSocket {
  return new WsRealtimeSocket(socket);
}

/** Forwards `ws` events to the connection that owns the socket. */
export function bindWebSocket(socket: WebSocket, sink: SocketEventSink): void {
  socket.on("message", (data, isBinary) => {
    if (isBinary) {
      sink.receive("");
      return;
    }
    sink.receive(decodeFrame(data));
  });
  socket.on("pong", () => sink.handlePong());
  socket.on("close", () => sink.handleSocketClosed());
  socket.on("error", (error) => {
    console.warn("chat.socket.error", { error: error.message });
  });
}
