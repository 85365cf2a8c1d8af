/**
 * MessageRouter Unit Tests
 *
 * Decoding, route lookup, per-route validation and error reporting. The
 * reply channel is a jest.fn so every envelope sent back can be asserted.
 */

import { z } from "zod";
import { EventBus } from "../../orchestrator/EventBus.js";
import {
  MessageRouter,
  type DispatchContext,
} from "../../orchestrator/MessageRouter.js";
import type { SendResult } from "../../orchestrator/SessionRegistry.js";
import type { OutboundEnvelope } from "../../schemas/envelopes.js";
import { ProtocolError } from "../../schemas/errors.js";
import type { Event } from "../../schemas/events.js";

const WorkSchema = z.object({
  type: z.literal("work"),
  n: z.number(),
  label: z.string().default("unnamed"),
});

function createContext() {
  const reply = jest.fn(
    async (_message: OutboundEnvelope): Promise<SendResult> => ({ ok: true }),
  );
  const ctx: DispatchContext = {
    connectionId: "conn-1",
    userId: "user-1",
    username: "ada",
    receivedAt: new Date("2026-03-01T12:00:00.000Z"),
    reply,
  };
  return { ctx, reply };
}

describe("MessageRouter", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation();
    jest.spyOn(console, "error").mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("register()", () => {
    it("should be chainable and list its routes", () => {
      const router = new MessageRouter()
        .register("work", WorkSchema, async () => {})
        .register("ping", z.object({ type: z.literal("ping") }), async () => {});

      expect(router.routeTypes()).toEqual(["work", "ping"]);
      expect(router.hasRoute("work")).toBe(true);
      expect(router.hasRoute("teleport")).toBe(false);
    });

    it("should refuse a second handler for the same type", () => {
      const router = new MessageRouter().register("work", WorkSchema, async () => {});

      expect(() => router.register("work", WorkSchema, async () => {})).toThrow(
        "Route already registered: work",
      );
    });
  });

  describe("dispatch()", () => {
    it("should hand the validated envelope to the handler", async () => {
      const handler = jest.fn(async (_ctx: DispatchContext, _env: z.infer<typeof WorkSchema>) => {});
      const router = new MessageRouter().register("work", WorkSchema, handler);
      const { ctx, reply } = createContext();

      const outcome = await router.dispatch(ctx, '{"type":"work","n":3,"extra":true}');

      expect(outcome).toEqual({ status: "handled", type: "work" });
      expect(handler).toHaveBeenCalledWith(ctx, { type: "work", n: 3, label: "unnamed" });
      expect(reply).not.toHaveBeenCalled();
    });

    it("should reject a frame that is not JSON", async () => {
      const router = new MessageRouter();
      const { ctx, reply } = createContext();

      const outcome = await router.dispatch(ctx, "{not json");

      expect(outcome).toEqual({ status: "rejected", type: null });
      expect(reply).toHaveBeenCalledTimes(1);
      expect(reply.mock.calls[0][0]).toMatchObject({
        type: "error",
        message: "Invalid message format",
      });
    });

    it("should reject an envelope without a type", async () => {
      const router = new MessageRouter();
      const { ctx, reply } = createContext();

      const outcome = await router.dispatch(ctx, '{"text":"hello"}');

      expect(outcome).toEqual({ status: "rejected", type: null });
      expect(reply).toHaveBeenCalledWith({
        type: "error",
        message: "Invalid message format",
        details: "type: Required",
      });
    });

    it("should report an unknown type", async () => {
      const router = new MessageRouter();
      const { ctx, reply } = createContext();

      const outcome = await router.dispatch(ctx, '{"type":"teleport"}');

      expect(outcome).toEqual({ status: "unknown_type", type: "teleport" });
      expect(reply).toHaveBeenCalledWith({
        type: "error",
        message: "Unknown message type: teleport",
      });
    });

    it("should report validation failures with the offending fields", async () => {
      const handler = jest.fn(async () => {});
      const router = new MessageRouter().register("work", WorkSchema, handler);
      const { ctx, reply } = createContext();

      const outcome = await router.dispatch(ctx, '{"type":"work","n":"three"}');

      expect(outcome).toEqual({ status: "rejected", type: "work" });
      expect(handler).not.toHaveBeenCalled();
      expect(reply).toHaveBeenCalledWith({
        type: "error",
        message: "Invalid work message",
        details: "n: Expected number, received string",
      });
    });

    it("should send a ProtocolError message to the client verbatim", async () => {
      const router = new MessageRouter().register("work", WorkSchema, async () => {
        throw new ProtocolError("Missing room name");
      });
      const { ctx, reply } = createContext();

      const outcome = await router.dispatch(ctx, '{"type":"work","n":1}');

      expect(outcome).toEqual({ status: "rejected", type: "work" });
      expect(reply).toHaveBeenCalledWith({ type: "error", message: "Missing room name" });
    });

    it("should hide internal error details by default", async () => {
      const router = new MessageRouter().register("work", WorkSchema, async () => {
        throw new Error("database is locked");
      });
      const { ctx, reply } = createContext();

      const outcome = await router.dispatch(ctx, '{"type":"work","n":1}');

      expect(outcome).toEqual({ status: "failed", type: "work" });
      expect(reply).toHaveBeenCalledWith({
        type: "error",
        message: "Failed to process work",
      });
    });

    it("should include internal error details when configured", async () => {
      const router = new MessageRouter({ exposeErrorDetails: true }).register(
        "work",
        WorkSchema,
        async () => {
          throw new Error("database is locked");
        },
      );
      const { ctx, reply } = createContext();

      await router.dispatch(ctx, '{"type":"work","n":1}');

      expect(reply).toHaveBeenCalledWith({
        type: "error",
        message: "Failed to process work",
        details: "database is locked",
      });
    });

    it("should publish handler failures on the event bus", async () => {
      const bus = new EventBus();
      const events: Event[] = [];
      bus.on("dispatch.error", (event) => events.push(event));
      const router = new MessageRouter({ eventBus: bus }).register(
        "work",
        WorkSchema,
        async () => {
          throw new Error("database is locked");
        },
      );
      const { ctx } = createContext();

      await router.dispatch(ctx, '{"type":"work","n":1}');

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        connection_id: "conn-1",
        source: "dispatch",
        type: "dispatch.error",
        payload: { message_type: "work", error: "database is locked" },
      });
    });

    it("should not throw when the reply cannot be delivered", async () => {
      const router = new MessageRouter();
      const { ctx, reply } = createContext();
      reply.mockResolvedValue({ ok: false, reason: "not_connected" });

      await expect(router.dispatch(ctx, '{"type":"teleport"}')).resolves.toEqual({
        status: "unknown_type",
        type: "teleport",
      });
    });
  });
});
