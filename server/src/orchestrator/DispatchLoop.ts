/**
 * Dispatch Loop - per-connection message pump
 *
 * CONNECTING -> CONNECTED -> (RECEIVING <-> DISPATCHING) -> CLOSING -> CLOSED
 * with ERRORED as the abnormal terminal state.
 *
 * Frames are buffered while the connection is being admitted and are then
 * dispatched strictly one at a time, in arrival order.
 */

import { EventEmitter } from "events";
import {
  disconnectEventName,
  type DisconnectEvent,
  type DisconnectReason,
  type SessionRegistry,
} from "./SessionRegistry.js";
import type { DispatchContext, DispatchOutcome, MessageRouter } from "./MessageRouter.js";
import type { OutboundEnvelope } from "../schemas/envelopes.js";

export type LoopState =
  | "CONNECTING"
  | "CONNECTED"
  | "RECEIVING"
  | "DISPATCHING"
  | "CLOSING"
  | "CLOSED"
  | "ERRORED";

export interface LoopIdentity {
  connectionId: string;
  userId: string | null;
  username: string;
}

export interface DispatchLoopOptions {
  /** Frames waiting in the inbox beyond this are rejected */
  maxInboundQueue?: number;
  exposeErrorDetails?: boolean;
  now?: () => Date;
}

export interface LoopClosedEvent {
  state: "CLOSED" | "ERRORED";
  reason: DisconnectReason;
}

export class DispatchLoop extends EventEmitter {
  private state: LoopState = "CONNECTING";
  private inbox: string[] = [];
  private pumping = false;
  private idleWaiters: Array<() => void> = [];
  private readonly maxInboundQueue: number;
  private readonly exposeErrorDetails: boolean;
  private readonly now: () => Date;
  private readonly onRegistryDisconnect: (event: DisconnectEvent) => void;

  constructor(
    private readonly identity: LoopIdentity,
    private readonly registry: SessionRegistry,
    private readonly router: MessageRouter,
    options: DispatchLoopOptions = {},
  ) {
    super();
    this.maxInboundQueue = options.maxInboundQueue ?? 64;
    this.exposeErrorDetails = options.exposeErrorDetails ?? false;
    this.now = options.now ?? (() => new Date());
    this.onRegistryDisconnect = (event) => {
      // CLOSING means close()/fail() triggered this disconnect and will finish up
      if (this.state !== "CLOSING") {
        this.terminate("CLOSED", event.reason);
      }
    };
  }

  get connectionId(): string {
    return this.identity.connectionId;
  }

  getState(): LoopState {
    return this.state;
  }

  pendingFrames(): number {
    return this.inbox.length;
  }

  /**
   * Called once the registry has admitted the connection
   */
  start(): void {
    if (this.state !== "CONNECTING") {
      return;
    }
    // Admission can retire the connection, e.g. when the welcome write fails
    if (!this.registry.isLive(this.identity.connectionId)) {
      this.terminate("CLOSED", "send_failed");
      return;
    }
    this.state = "CONNECTED";
    this.registry.on(disconnectEventName(this.identity.connectionId), this.onRegistryDisconnect);
    this.state = "RECEIVING";
    void this.pump();
  }

  /**
   * Queue one inbound frame
   * @returns false when the frame was dropped
   */
  enqueue(raw: string): boolean {
    if (this.isTerminal() || this.state === "CLOSING") {
      return false;
    }

    if (this.inbox.length >= this.maxInboundQueue) {
      console.warn(
        `[Dispatch] Inbox full for ${this.identity.connectionId}, dropping frame`,
      );
      void this.reply({
        type: "error",
        message: "Too many pending messages",
        details: `inbound queue limit is ${this.maxInboundQueue}`,
      });
      return false;
    }

    this.inbox.push(raw);
    void this.pump();
    return true;
  }

  /**
   * Graceful end: the transport closed or the client left
   */
  close(reason: DisconnectReason = "transport_closed"): void {
    if (this.isTerminal() || this.state === "CLOSING") {
      return;
    }
    this.state = "CLOSING";
    this.inbox = [];
    this.registry.disconnect(this.identity.connectionId, reason);
    this.terminate("CLOSED", reason);
  }

  /**
   * Abnormal end: notify the client if still possible, then disconnect
   */
  async fail(
    error: Error,
    reason: DisconnectReason = "loop_error",
  ): Promise<void> {
    if (this.isTerminal() || this.state === "CLOSING") {
      return;
    }
    console.error(
      `[Dispatch] Loop error for ${this.identity.connectionId}:`,
      error,
    );
    this.state = "CLOSING";
    this.inbox = [];

    await this.reply({
      type: "error",
      message: "An error occurred",
      ...(this.exposeErrorDetails ? { details: error.message } : {}),
    });

    this.registry.disconnect(this.identity.connectionId, reason);
    this.terminate("ERRORED", reason);
  }

  /**
   * Resolves once the inbox is drained and no frame is being dispatched
   */
  whenIdle(): Promise<void> {
    if (!this.pumping && (this.inbox.length === 0 || this.state !== "RECEIVING")) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private async pump(): Promise<void> {
    if (this.pumping || this.state !== "RECEIVING") {
      return;
    }
    this.pumping = true;

    try {
      while (this.getState() === "RECEIVING" && this.inbox.length > 0) {
        const raw = this.inbox.shift();
        if (raw === undefined) break;

        this.state = "DISPATCHING";
        const outcome: DispatchOutcome = await this.router.dispatch(
          this.context(),
          raw,
        );
        if (this.getState() === "DISPATCHING") {
          this.state = "RECEIVING";
        }
        this.emit("dispatched", outcome);
      }
    } catch (error) {
      this.pumping = false;
      await this.fail(error instanceof Error ? error : new Error(String(error)));
    } finally {
      this.pumping = false;
      this.notifyIdle();
    }
  }

  private context(): DispatchContext {
    return {
      connectionId: this.identity.connectionId,
      userId: this.identity.userId,
      username: this.identity.username,
      receivedAt: this.now(),
      reply: (message) => this.reply(message),
    };
  }

  private reply(message: OutboundEnvelope) {
    return this.registry.send(this.identity.connectionId, message);
  }

  private isTerminal(): boolean {
    return this.state === "CLOSED" || this.state === "ERRORED";
  }

  private terminate(state: "CLOSED" | "ERRORED", reason: DisconnectReason): void {
    if (this.isTerminal()) {
      return;
    }
    this.state = state;
    this.inbox = [];
    this.registry.off(disconnectEventName(this.identity.connectionId), this.onRegistryDisconnect);
    const event: LoopClosedEvent = { state, reason };
    this.emit("closed", event);
    this.notifyIdle();
  }

  private notifyIdle(): void {
    if (this.pumping) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
