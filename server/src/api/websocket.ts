/**
 * WebSocket server for the realtime assistant channel
 *
 * One DispatchLoop per connection. The SessionRegistry owns the connection
 * table; this class only adapts ws events onto the loop.
 */

import type { IncomingMessage, Server } from "http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { v4 as uuidv4 } from "uuid";
import type { ServerConfig } from "../config/index.js";
import { DispatchLoop } from "../orchestrator/DispatchLoop.js";
import type { MessageRouter } from "../orchestrator/MessageRouter.js";
import type { SessionRegistry } from "../orchestrator/SessionRegistry.js";
import { extractToken, resolveIdentity } from "./auth.js";

export interface RealtimeServerOptions {
  path: string;
  defaultRoom: string;
  maxInboundQueue: number;
  exposeErrorDetails: boolean;
  auth: ServerConfig["auth"];
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

export class RealtimeWebSocketServer {
  private wss: WebSocketServer;
  private loops: Map<string, DispatchLoop> = new Map();

  constructor(
    server: Server,
    private readonly registry: SessionRegistry,
    private readonly router: MessageRouter,
    private readonly options: RealtimeServerOptions,
  ) {
    this.wss = new WebSocketServer({ server, path: options.path });

    this.wss.on("connection", (ws, request) => {
      this.handleConnection(ws, request).catch((error) => {
        console.error("[WebSocket] Failed to set up connection:", error);
        ws.close(1011, "Connection setup failed");
      });
    });
    console.log(`[WebSocket] Server initialized on ${options.path}`);
  }

  private async handleConnection(
    ws: WebSocket,
    request: IncomingMessage,
  ): Promise<void> {
    const identity = resolveIdentity(extractToken(request.url), this.options.auth);
    const connectionId = uuidv4();

    const loop = new DispatchLoop(
      { connectionId, userId: identity.userId, username: identity.username },
      this.registry,
      this.router,
      {
        maxInboundQueue: this.options.maxInboundQueue,
        exposeErrorDetails: this.options.exposeErrorDetails,
      },
    );
    this.loops.set(connectionId, loop);
    loop.once("closed", () => this.loops.delete(connectionId));

    // Listeners go on before the first await so no early frame is lost
    ws.on("message", (data) => {
      loop.enqueue(rawDataToString(data));
    });
    ws.on("close", () => {
      console.log(`[WebSocket] Client disconnected: ${connectionId}`);
      loop.close("transport_closed");
    });
    ws.on("error", (error) => {
      console.error(`[WebSocket] Error for ${connectionId}:`, error);
      void loop.fail(error, "transport_error");
    });

    await this.registry.connect(ws, connectionId, identity.userId, {
      username: identity.username,
      authenticated: identity.authenticated,
    });
    this.registry.join(connectionId, this.options.defaultRoom);
    loop.start();
  }

  /**
   * Close every client, then stop accepting new ones
   */
  shutdown(): Promise<void> {
    const closed = this.registry.closeAll();
    console.log(`[WebSocket] Shutdown closed ${closed} connection(s)`);

    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  getConnectionCount(): number {
    return this.registry.connectionCount();
  }

  getLoop(connectionId: string): DispatchLoop | undefined {
    return this.loops.get(connectionId);
  }
}
