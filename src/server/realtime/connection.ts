import { randomUUID } from "node:crypto";

import type { ChatAckEventPayload, ChatServerEvent } from "@/lib/chat/events";
import { parseClientFrame, type ChatClientFrame } from "@/lib/chat/frames";
import { debugLog } from "@/lib/debug";
import type { CredentialResolver } from "@/ports/auth";
import type { ConnectionHandle, RealtimeSocket } from "@/ports/realtime";
import type { ChatService } from "@/server/chat/service";
import { ChatServiceError, DeliveryError } from "@/server/chat/types";
import { reportUnexpectedError } from "@/server/observability/sentry";

import type { ConnectionRegistry } from "./connection-registry";

export const CLOSE_CODES = {
  normal: 1000,
  goingAway: 1001,
  policyViolation: 1008,
  internalError: 1011,
  unauthorized: 4401,
  idleTimeout: 4408,
} as const;

export type ConnectionState = "connecting" | "authenticated" | "active" | "closing" | "closed";

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  connecting: ["authenticated", "closing"],
  authenticated: ["active", "closing"],
  active: ["closing"],
  closing: ["closed"],
  closed: [],
};

export type ChatConnectionOptions = {
  idleTimeoutMs: number;
  heartbeatIntervalMs: number;
  maxProtocolViolations: number;
  maxBufferedBytes: number;
};

export type ChatConnectionDependencies = {
  socket: RealtimeSocket;
  registry: ConnectionRegistry;
  service: ChatService;
  resolver: CredentialResolver;
  options: ChatConnectionOptions;
  id?: string;
};

/**
 * One WebSocket client. Inbound frames are handled strictly in receipt order and
 * every frame gets exactly one direct reply.
 */
export class ChatConnection implements ConnectionHandle {
  readonly id: string;
  private currentState: ConnectionState = "connecting";
  private authenticatedUserId: string | null = null;
  private readonly socket: RealtimeSocket;
  private readonly registry: ConnectionRegistry;
  private readonly service: ChatService;
  private readonly resolver: CredentialResolver;
  private readonly options: ChatConnectionOptions;
  private inbound: Promise<void> = Promise.resolve();
  private violations = 0;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: ChatConnectionDependencies) {
    this.id = deps.id ?? randomUUID();
    this.socket = deps.socket;
    this.registry = deps.registry;
    this.service = deps.service;
    this.resolver = deps.resolver;
    this.options = deps.options;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get userId(): string {
    if (!this.authenticatedUserId) {
      throw new Error(`Connection ${this.id} has no authenticated user`);
    }
    return this.authenticatedUserId;
  }

  /** Authenticates, registers and announces the connection. Resolves once it is active or closed. */
  open(token: string | null): Promise<void> {
    const opening = this.activate(token);
    this.inbound = opening;
    return opening;
  }

  receive(raw: string): void {
    if (this.currentState === "closing" || this.currentState === "closed") return;
    this.markAlive();
    this.inbound = this.inbound.then(() => this.handleFrame(raw));
  }

  handlePong(): void {
    this.markAlive();
  }

  handleSocketClosed(): void {
    if (this.currentState === "closed") return;
    if (this.currentState !== "closing") {
      this.transition("closing");
    }
    this.finalize();
  }

  deliver(event: ChatServerEvent): Promise<void> {
    if (this.currentState !== "active") {
      return Promise.reject(new DeliveryError(this.id, `Connection is ${this.currentState}.`));
    }
    const buffered = this.socket.bufferedAmount();
    if (buffered > this.options.maxBufferedBytes) {
      return Promise.reject(
        new DeliveryError(this.id, `Slow consumer: ${buffered} bytes buffered.`),
      );
    }
    return this.socket.send(JSON.stringify(event));
  }

  terminate(code: number, reason: string): void {
    if (this.currentState === "closing" || this.currentState === "closed") return;
    this.transition("closing");
    this.socket.close(code, reason);
    this.finalize();
  }

  /** Settles once every frame received so far has been handled. */
  idle(): Promise<void> {
    return this.inbound;
  }

  private async activate(token: string | null): Promise<void> {
    try {
      const credential = await this.resolver.resolve(token ?? "");
      if (this.currentState !== "connecting") return;
      this.authenticatedUserId = credential.userId;
      this.transition("authenticated");
    } catch (error) {
      if (this.currentState !== "connecting") return;
      const failure =
        error instanceof ChatServiceError
          ? error
          : new ChatServiceError("auth_failed", 401, "Authentication failed.");
      if (!(error instanceof ChatServiceError)) {
        reportUnexpectedError("chat.connection.auth_failed", error, { connectionId: this.id });
      }
      await this.sendRaw({
        type: "chat.error",
        requestId: null,
        error: { code: failure.code, message: failure.message },
      });
      this.terminate(CLOSE_CODES.unauthorized, "unauthorized");
      return;
    }

    try {
      this.registry.register(this);
      this.transition("active");
      const { conversations, unread } = await this.service.connect(this.userId, this.id);
      if (this.state !== "active") return;
      this.startTimers();
      await this.send({
        type: "chat.ready",
        connectionId: this.id,
        userId: this.userId,
        conversations,
        unread,
        heartbeatIntervalMs: this.options.heartbeatIntervalMs,
      });
      debugLog("chat.connection", "active", { connectionId: this.id, userId: this.userId });
    } catch (error) {
      reportUnexpectedError("chat.connection.activation_failed", error, { connectionId: this.id });
      this.terminate(CLOSE_CODES.internalError, "activation failed");
    }
  }

  private async handleFrame(raw: string): Promise<void> {
    if (this.currentState !== "active") return;
    const parsed = parseClientFrame(raw);
    if (!parsed.ok) {
      this.violations += 1;
      await this.send({
        type: "chat.error",
        requestId: parsed.requestId,
        error: { code: "invalid_frame", message: parsed.message },
      });
      if (this.violations >= this.options.maxProtocolViolations) {
        console.warn("chat.connection.protocol_violations", {
          connectionId: this.id,
          userId: this.userId,
          violations: this.violations,
        });
        this.terminate(CLOSE_CODES.policyViolation, "too many invalid frames");
      }
      return;
    }

    const { frame } = parsed;
    const requestId = frame.requestId ?? null;
    try {
      const reply = await this.dispatch(frame, requestId);
      await this.send(reply);
    } catch (error) {
      if (error instanceof ChatServiceError) {
        debugLog("chat.connection", "frame rejected", { type: frame.type, code: error.code });
        await this.send({
          type: "chat.error",
          requestId,
          error: { code: error.code, message: error.message },
        });
        return;
      }
      reportUnexpectedError("chat.connection.frame_failed", error, {
        connectionId: this.id,
        frame: frame.type,
      });
      await this.send({
        type: "chat.error",
        requestId,
        error: { code: "internal_error", message: "Something went wrong handling this frame." },
      });
    }
  }

  private async dispatch(frame: ChatClientFrame, requestId: string | null): Promise<ChatServerEvent> {
    const ack = (applied: boolean, extra: Partial<ChatAckEventPayload> = {}): ChatAckEventPayload => ({
      type: "chat.ack",
      requestId,
      action: frame.type,
      applied,
      ...extra,
    });

    switch (frame.type) {
      case "ping":
        return { type: "chat.pong", requestId, at: new Date().toISOString() };
      case "message.send": {
        const { message, created } = await this.service.sendMessage(this.userId, {
          conversationId: frame.conversationId,
          body: frame.body,
          attachments: frame.attachments,
          parentId: frame.parentId,
          clientMessageId: frame.clientMessageId,
        });
        return ack(created, { message });
      }
      case "message.edit": {
        const message = await this.service.editMessage(this.userId, frame.messageId, frame.body);
        return ack(true, { message });
      }
      case "message.delete": {
        const { message, applied } = await this.service.deleteMessage(this.userId, frame.messageId);
        return ack(applied, { message });
      }
      case "typing": {
        const changed = await this.service.setTyping(
          this.userId,
          frame.conversationId,
          frame.isTyping,
        );
        return ack(changed);
      }
      case "read": {
        const { applied } = await this.service.markRead(
          this.userId,
          frame.messageId,
          frame.conversationId,
        );
        return ack(applied);
      }
      case "reaction.add":
        return ack(await this.service.addReaction(this.userId, frame.messageId, frame.emoji));
      case "reaction.remove":
        return ack(await this.service.removeReaction(this.userId, frame.messageId, frame.emoji));
      case "subscribe": {
        const presence = await this.service.subscribe(this.id, this.userId, frame.conversationId);
        return ack(true, { presence });
      }
      case "unsubscribe":
        return ack(this.service.unsubscribe(this.id, frame.conversationId));
    }
  }

  private async send(event: ChatServerEvent): Promise<void> {
    if (this.currentState !== "active") return;
    try {
      await this.deliver(event);
    } catch (error) {
      console.warn("chat.connection.reply_failed", {
        connectionId: this.id,
        event: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
      this.terminate(CLOSE_CODES.internalError, "delivery failed");
    }
  }

  // Used before activation, when `deliver` would refuse the write.
  private async sendRaw(event: ChatServerEvent): Promise<void> {
    try {
      await this.socket.send(JSON.stringify(event));
    } catch (error) {
      debugLog("chat.connection", "pre-activation write failed", error);
    }
  }

  private transition(next: ConnectionState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new Error(`Invalid connection transition ${this.currentState} -> ${next}`);
    }
    debugLog("chat.connection", "transition", { connectionId: this.id, from: this.currentState, to: next });
    this.currentState = next;
  }

  private markAlive(): void {
    if (this.currentState !== "active") return;
    this.registry.touch(this.id);
    this.armIdleTimer();
  }

  private startTimers(): void {
    this.armIdleTimer();
    this.heartbeatTimer = setInterval(() => {
      if (this.currentState === "active") this.socket.ping();
    }, this.options.heartbeatIntervalMs);
    this.heartbeatTimer.unref?.();
  }

  private armIdleTimer(): void {
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = setTimeout(() => {
      debugLog("chat.connection", "idle timeout", this.id);
      this.terminate(CLOSE_CODES.idleTimeout, "idle timeout");
    }, this.options.idleTimeoutMs);
    this.idleTimer.unref?.();
  }

  private finalize(): void {
    if (this.idleTimer) clearTimeout(this.idleTimer);
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.idleTimer = null;
    this.heartbeatTimer = null;
    this.registry.unregister(this.id);
    if (this.authenticatedUserId) {
      this.service.releaseTyping(this.authenticatedUserId);
    }
    this.transition("closed");
  }
}
