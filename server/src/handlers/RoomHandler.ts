/**
 * Room Handler - join_room, leave_room and broadcast envelopes
 */

import type { SessionRegistry } from "../orchestrator/SessionRegistry.js";
import type { DispatchContext } from "../orchestrator/MessageRouter.js";
import type {
  BroadcastRequestEnvelope,
  JoinRoomEnvelope,
  LeaveRoomEnvelope,
} from "../schemas/envelopes.js";
import { ProtocolError } from "../schemas/errors.js";

export interface RoomHandlerOptions {
  defaultRoom: string;
  excludeSender: boolean;
}

export class RoomHandler {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly options: RoomHandlerOptions,
  ) {}

  async handleJoin(ctx: DispatchContext, envelope: JoinRoomEnvelope): Promise<void> {
    const room = envelope.room ?? this.options.defaultRoom;
    if (!this.registry.join(ctx.connectionId, room)) {
      // Connection went away mid-dispatch; nothing to acknowledge
      return;
    }
    await ctx.reply({ type: "room_joined", room });
  }

  async handleLeave(ctx: DispatchContext, envelope: LeaveRoomEnvelope): Promise<void> {
    if (!envelope.room) {
      throw new ProtocolError("Missing room name");
    }
    this.registry.leave(ctx.connectionId, envelope.room);
    await ctx.reply({ type: "room_left", room: envelope.room });
  }

  async handleBroadcast(
    ctx: DispatchContext,
    envelope: BroadcastRequestEnvelope,
  ): Promise<void> {
    const room = envelope.room ?? this.options.defaultRoom;
    const exclude = this.options.excludeSender ? [ctx.connectionId] : [];

    const report = await this.registry.sendToRoom(
      room,
      {
        type: "broadcast",
        from: ctx.username,
        from_connection: ctx.connectionId,
        room,
        message: envelope.message ?? {},
      },
      exclude,
    );

    if (report.failed.length > 0) {
      console.warn(
        `[RoomHandler] Broadcast to ${room} failed for ${report.failed.length} connection(s)`,
      );
    }
  }
}
