/**
 * Session Registry - admits, addresses and retires live connections
 *
 * Owns the connection map, the user index and the room directory. Every
 * mutation runs synchronously between awaits, so connect/disconnect/join/leave
 * are single critical sections on the event loop. Fan-out snapshots its
 * recipients first and re-checks liveness per recipient.
 */

import { EventEmitter } from "events";
import { WebSocket } from "ws";
import { v4 as uuidv4 } from "uuid";
import { EventBus } from "./EventBus.js";
import { RoomDirectory } from "./RoomDirectory.js";
import type {
  OutboundEnvelope,
  StampedEnvelope,
} from "../schemas/envelopes.js";

/**
 * Message-oriented transport handle. `ws` WebSocket instances satisfy it.
 */
export interface Transport {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export type ConnectionMetadata = Record<string, unknown>;

export interface ConnectionInfo {
  connectionId: string;
  userId: string | null;
  joinedAt: Date;
  metadata: ConnectionMetadata;
}

interface RegisteredConnection extends ConnectionInfo {
  transport: Transport;
  pendingSends: number;
}

export type SendFailureReason = "not_connected" | "send_failed" | "backpressure";

export type SendResult =
  | { ok: true }
  | { ok: false; reason: SendFailureReason; error?: Error };

export interface FanOutReport {
  delivered: string[];
  failed: string[];
}

export type DisconnectReason =
  | "client_disconnect"
  | "transport_closed"
  | "transport_error"
  | "send_failed"
  | "backpressure"
  | "server_shutdown"
  | "loop_error";

export interface DisconnectEvent {
  connectionId: string;
  reason: DisconnectReason;
  rooms: string[];
}

export interface SessionRegistryOptions {
  welcomeMessage?: string;
  /** Outstanding sends per connection before it is dropped */
  maxOutboundQueue?: number;
  roomSweepThreshold?: number;
  eventBus?: EventBus;
  now?: () => Date;
}

// Close codes used when the registry retires a connection itself
const CLOSE_CODES: Partial<Record<DisconnectReason, number>> = {
  send_failed: 1011,
  loop_error: 1011,
  backpressure: 1013,
};

/**
 * Per-connection disconnect event, so each dispatch loop listens only for
 * its own connection
 */
export function disconnectEventName(connectionId: string): string {
  return `disconnect:${connectionId}`;
}

export class SessionRegistry extends EventEmitter {
  private connections: Map<string, RegisteredConnection> = new Map();
  private userIndex: Map<string, string> = new Map();
  private rooms: RoomDirectory;
  private readonly welcomeMessage: string;
  private readonly maxOutboundQueue: number;
  private readonly eventBus: EventBus | null;
  private readonly now: () => Date;

  constructor(options: SessionRegistryOptions = {}) {
    super();
    this.welcomeMessage =
      options.welcomeMessage ?? "Connection established. Assistant online.";
    this.maxOutboundQueue = options.maxOutboundQueue ?? 256;
    this.eventBus = options.eventBus ?? null;
    this.now = options.now ?? (() => new Date());
    this.rooms = new RoomDirectory({
      isLive: (connectionId) => this.connections.has(connectionId),
      sweepThreshold: options.roomSweepThreshold,
    });
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────

  /**
   * Register a connection and send it the "connected" acknowledgment.
   * The connection is addressable as soon as this is called.
   */
  async connect(
    transport: Transport,
    connectionId: string,
    userId: string | null = null,
    metadata: ConnectionMetadata = {},
  ): Promise<ConnectionInfo> {
    if (this.connections.has(connectionId)) {
      throw new Error(`Connection already registered: ${connectionId}`);
    }

    const connection: RegisteredConnection = {
      connectionId,
      userId,
      joinedAt: this.now(),
      metadata: { ...metadata },
      transport,
      pendingSends: 0,
    };
    this.connections.set(connectionId, connection);

    if (userId) {
      // Single session per user: the newest connection wins
      this.userIndex.set(userId, connectionId);
    }

    const username = usernameOf(connection);
    console.log(
      `[SessionRegistry] Connected: ${connectionId} (user: ${userId ?? "guest"}, total: ${this.connections.size})`,
    );

    this.eventBus?.emit({
      event_id: uuidv4(),
      connection_id: connectionId,
      t_ms: Date.now(),
      source: "registry",
      type: "connection.open",
      payload: { user_id: userId, username },
    });

    await this.send(connectionId, {
      type: "system",
      event: "connected",
      message: this.welcomeMessage,
      connection_id: connectionId,
      user_id: userId,
      username,
    });

    return toInfo(connection);
  }

  /**
   * Remove a connection from the active map, every room and the user index.
   * Repeated calls are no-ops.
   * @returns true when the connection was live
   */
  disconnect(
    connectionId: string,
    reason: DisconnectReason = "client_disconnect",
  ): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return false;
    }

    this.connections.delete(connectionId);
    const rooms = this.rooms.purge(connectionId);

    if (
      connection.userId &&
      this.userIndex.get(connection.userId) === connectionId
    ) {
      this.userIndex.delete(connection.userId);
    }

    const closeCode = CLOSE_CODES[reason];
    if (closeCode !== undefined) {
      try {
        connection.transport.close(closeCode, reason);
      } catch (error) {
        console.warn(
          `[SessionRegistry] Failed to close transport for ${connectionId}:`,
          error,
        );
      }
    }

    console.log(
      `[SessionRegistry] Disconnected: ${connectionId} (${reason}, remaining: ${this.connections.size})`,
    );

    this.eventBus?.emit({
      event_id: uuidv4(),
      connection_id: connectionId,
      t_ms: Date.now(),
      source: "registry",
      type: "connection.close",
      payload: {
        reason,
        rooms,
        duration_ms: this.now().getTime() - connection.joinedAt.getTime(),
      },
    });

    const event: DisconnectEvent = { connectionId, reason, rooms };
    this.emit("disconnect", event);
    this.emit(disconnectEventName(connectionId), event);
    return true;
  }

  /**
   * Close every transport and remove every connection, even when a close
   * call throws.
   */
  closeAll(): number {
    const ids = Array.from(this.connections.keys());
    for (const connectionId of ids) {
      const connection = this.connections.get(connectionId);
      if (!connection) continue;
      try {
        connection.transport.close(1001, "Server shutting down");
      } catch (error) {
        console.warn(
          `[SessionRegistry] Close failed for ${connectionId} during shutdown:`,
          error,
        );
      }
      this.disconnect(connectionId, "server_shutdown");
    }
    console.log(`[SessionRegistry] Closed ${ids.length} connection(s)`);
    return ids.length;
  }

  // ── Addressed delivery ────────────────────────────────────────────────

  /**
   * Deliver one message. A transport failure disconnects the connection and
   * is reported in the result, never thrown.
   */
  async send(
    connectionId: string,
    message: OutboundEnvelope,
  ): Promise<SendResult> {
    const result = await this.deliver(connectionId, this.stamp(message));
    if (!result.ok && result.reason !== "not_connected") {
      this.disconnect(connectionId, result.reason);
    }
    return result;
  }

  /**
   * Deliver to the connection currently mapped from a user id
   */
  async sendToUser(
    userId: string,
    message: OutboundEnvelope,
  ): Promise<SendResult> {
    const connectionId = this.userIndex.get(userId);
    if (!connectionId) {
      return { ok: false, reason: "not_connected" };
    }
    return this.send(connectionId, message);
  }

  /**
   * Deliver to every live connection outside `exclude`. Failed recipients
   * are disconnected after the sweep.
   */
  async broadcast(
    message: OutboundEnvelope,
    exclude: Iterable<string> = [],
  ): Promise<FanOutReport> {
    const skip = new Set(exclude);
    const recipients = Array.from(this.connections.keys()).filter(
      (id) => !skip.has(id),
    );
    return this.fanOut(recipients, message);
  }

  // ── Rooms ─────────────────────────────────────────────────────────────

  join(connectionId: string, room: string): boolean {
    const joined = this.rooms.join(connectionId, room);
    if (joined) {
      this.emitRoomEvent("room.joined", connectionId, room);
    }
    return joined;
  }

  leave(connectionId: string, room: string): boolean {
    const left = this.rooms.leave(connectionId, room);
    if (left) {
      this.emitRoomEvent("room.left", connectionId, room);
    }
    return left;
  }

  /**
   * Fan out to the members of a room as they are at call time
   */
  async sendToRoom(
    room: string,
    message: OutboundEnvelope,
    exclude: Iterable<string> = [],
  ): Promise<FanOutReport> {
    const skip = new Set(exclude);
    const recipients = this.rooms.members(room).filter((id) => !skip.has(id));
    return this.fanOut(recipients, message);
  }

  members(room: string): string[] {
    return this.rooms.members(room);
  }

  roomsOf(connectionId: string): string[] {
    return this.rooms.roomsOf(connectionId);
  }

  roomCount(): number {
    return this.rooms.roomCount();
  }

  sweepEmptyRooms(): number {
    return this.rooms.sweepEmptyRooms();
  }

  // ── Introspection ─────────────────────────────────────────────────────

  connectionCount(): number {
    return this.connections.size;
  }

  connectionIds(): string[] {
    return Array.from(this.connections.keys());
  }

  isLive(connectionId: string): boolean {
    return this.connections.has(connectionId);
  }

  getConnectionInfo(connectionId: string): ConnectionInfo | null {
    const connection = this.connections.get(connectionId);
    return connection ? toInfo(connection) : null;
  }

  getUserConnection(userId: string): string | null {
    return this.userIndex.get(userId) ?? null;
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private stamp(message: OutboundEnvelope): StampedEnvelope {
    return { ...message, timestamp: this.now().toISOString() };
  }

  private async fanOut(
    recipients: string[],
    message: OutboundEnvelope,
  ): Promise<FanOutReport> {
    const stamped = this.stamp(message);
    const results = await Promise.all(
      recipients.map(async (id) => ({
        id,
        result: await this.deliver(id, stamped),
      })),
    );

    const report: FanOutReport = { delivered: [], failed: [] };
    const toRetire: Array<[string, DisconnectReason]> = [];
    for (const { id, result } of results) {
      if (result.ok) {
        report.delivered.push(id);
      } else if (result.reason !== "not_connected") {
        console.error(`[SessionRegistry] Fan-out to ${id} failed (${result.reason})`);
        report.failed.push(id);
        toRetire.push([id, result.reason]);
      }
    }

    for (const [id, reason] of toRetire) {
      this.disconnect(id, reason);
    }
    return report;
  }

  /**
   * Hand a stamped message to the transport. Never throws.
   */
  private deliver(
    connectionId: string,
    message: StampedEnvelope,
  ): Promise<SendResult> {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return Promise.resolve({ ok: false, reason: "not_connected" });
    }

    if (connection.transport.readyState !== WebSocket.OPEN) {
      return Promise.resolve({
        ok: false,
        reason: "send_failed",
        error: new Error(
          `Transport not open (readyState ${connection.transport.readyState})`,
        ),
      });
    }

    if (connection.pendingSends >= this.maxOutboundQueue) {
      console.warn(
        `[SessionRegistry] Outbound queue full for ${connectionId} (${connection.pendingSends} pending)`,
      );
      return Promise.resolve({ ok: false, reason: "backpressure" });
    }

    const data = JSON.stringify(message);
    connection.pendingSends++;

    return new Promise<SendResult>((resolve) => {
      let settled = false;
      const settle = (err?: Error) => {
        if (settled) return;
        settled = true;
        connection.pendingSends--;
        if (err) {
          console.error(`[SessionRegistry] Send to ${connectionId} failed:`, err);
          resolve({ ok: false, reason: "send_failed", error: err });
        } else {
          resolve({ ok: true });
        }
      };

      try {
        connection.transport.send(data, settle);
      } catch (error) {
        settle(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  private emitRoomEvent(
    type: "room.joined" | "room.left",
    connectionId: string,
    room: string,
  ): void {
    this.eventBus?.emit({
      event_id: uuidv4(),
      connection_id: connectionId,
      t_ms: Date.now(),
      source: "registry",
      type,
      payload: { room },
    });
  }
}

function usernameOf(connection: ConnectionInfo): string {
  const username = connection.metadata.username;
  return typeof username === "string" && username.length > 0
    ? username
    : "guest";
}

function toInfo(connection: RegisteredConnection): ConnectionInfo {
  return {
    connectionId: connection.connectionId,
    userId: connection.userId,
    joinedAt: connection.joinedAt,
    metadata: { ...connection.metadata },
  };
}
