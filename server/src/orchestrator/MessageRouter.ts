/**
 * Message Router - decodes one inbound frame and routes it by `type`
 *
 * Never throws: every failure while handling one envelope is reported to the
 * originating connection as an `error` envelope.
 */

import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import { EventBus } from "./EventBus.js";
import type { SendResult } from "./SessionRegistry.js";
import {
  formatIssues,
  parseEnvelope,
  type ErrorEnvelope,
  type InboundEnvelope,
  type OutboundEnvelope,
} from "../schemas/envelopes.js";
import { ProtocolError } from "../schemas/errors.js";

export interface DispatchContext {
  connectionId: string;
  userId: string | null;
  username: string;
  /** When the frame was taken off the inbox */
  receivedAt: Date;
  reply(message: OutboundEnvelope): Promise<SendResult>;
}

export type DispatchStatus = "handled" | "rejected" | "unknown_type" | "failed";

export interface DispatchOutcome {
  status: DispatchStatus;
  type: string | null;
}

type Route = (ctx: DispatchContext, envelope: InboundEnvelope) => Promise<void>;

export interface MessageRouterOptions {
  exposeErrorDetails?: boolean;
  eventBus?: EventBus;
}

export class MessageRouter {
  private routes: Map<string, Route> = new Map();
  private readonly exposeErrorDetails: boolean;
  private readonly eventBus: EventBus | null;

  constructor(options: MessageRouterOptions = {}) {
    this.exposeErrorDetails = options.exposeErrorDetails ?? false;
    this.eventBus = options.eventBus ?? null;
  }

  /**
   * Register a handler for a message type. The envelope is validated against
   * `schema` before the handler runs.
   */
  register<T>(
    type: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    handler: (ctx: DispatchContext, payload: T) => Promise<void>,
  ): this {
    if (this.routes.has(type)) {
      throw new Error(`Route already registered: ${type}`);
    }

    this.routes.set(type, async (ctx, envelope) => {
      const result = schema.safeParse(envelope);
      if (!result.success) {
        throw new ProtocolError(
          `Invalid ${type} message`,
          formatIssues(result.error),
        );
      }
      await handler(ctx, result.data);
    });
    return this;
  }

  hasRoute(type: string): boolean {
    return this.routes.has(type);
  }

  routeTypes(): string[] {
    return Array.from(this.routes.keys());
  }

  async dispatch(ctx: DispatchContext, raw: string): Promise<DispatchOutcome> {
    const parsed = parseEnvelope(raw);
    if (!parsed.ok) {
      console.warn(
        `[Dispatch] Malformed envelope from ${ctx.connectionId}: ${parsed.details ?? parsed.message}`,
      );
      await ctx.reply(errorEnvelope(parsed.message, parsed.details));
      return { status: "rejected", type: null };
    }

    const { type } = parsed.envelope;
    const route = this.routes.get(type);
    if (!route) {
      console.warn(`[Dispatch] Unknown message type: ${type}`);
      await ctx.reply(errorEnvelope(`Unknown message type: ${type}`));
      return { status: "unknown_type", type };
    }

    try {
      await route(ctx, parsed.envelope);
      return { status: "handled", type };
    } catch (error) {
      if (error instanceof ProtocolError) {
        await ctx.reply(errorEnvelope(error.message, error.details));
        return { status: "rejected", type };
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Dispatch] Error handling ${type} for ${ctx.connectionId}:`, error);
      this.eventBus?.emit({
        event_id: uuidv4(),
        connection_id: ctx.connectionId,
        t_ms: Date.now(),
        source: "dispatch",
        type: "dispatch.error",
        payload: { message_type: type, error: message },
      });
      await ctx.reply(
        errorEnvelope(
          `Failed to process ${type}`,
          this.exposeErrorDetails ? message : undefined,
        ),
      );
      return { status: "failed", type };
    }
  }
}

function errorEnvelope(message: string, details?: string): ErrorEnvelope {
  return details === undefined
    ? { type: "error", message }
    : { type: "error", message, details };
}
