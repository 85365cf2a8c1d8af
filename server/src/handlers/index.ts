/**
 * Routing table for the realtime channel
 */

import { EventBus } from "../orchestrator/EventBus.js";
import { MessageRouter } from "../orchestrator/MessageRouter.js";
import type { SessionRegistry } from "../orchestrator/SessionRegistry.js";
import type { InferenceAdapters } from "../providers/InferenceAdapters.js";
import {
  AudioChunkSchema,
  BroadcastSchema,
  CameraFrameSchema,
  JoinRoomSchema,
  LeaveRoomSchema,
  PingSchema,
  VoiceCommandSchema,
} from "../schemas/envelopes.js";
import type { ConversationRepository } from "../storage/ConversationStore.js";
import { RoomHandler } from "./RoomHandler.js";
import { VisionHandler } from "./VisionHandler.js";
import { VoiceHandler } from "./VoiceHandler.js";

export interface RouterDependencies {
  registry: SessionRegistry;
  adapters: InferenceAdapters;
  conversations?: ConversationRepository | null;
  eventBus?: EventBus | null;
}

export interface RouterSettings {
  defaultRoom: string;
  excludeSenderOnBroadcast: boolean;
  adapterTimeoutMs: number;
  maxFacesPerFrame: number;
  defaultLanguage: string;
  spokenReplies: boolean;
  exposeErrorDetails: boolean;
}

export function createMessageRouter(
  deps: RouterDependencies,
  settings: RouterSettings,
): MessageRouter {
  const eventBus = deps.eventBus ?? null;
  const router = new MessageRouter({
    exposeErrorDetails: settings.exposeErrorDetails,
    eventBus: eventBus ?? undefined,
  });

  const voice = new VoiceHandler(
    {
      voice: deps.adapters.voice,
      brain: deps.adapters.brain,
      conversations: deps.conversations,
      eventBus,
    },
    {
      adapterTimeoutMs: settings.adapterTimeoutMs,
      defaultLanguage: settings.defaultLanguage,
      spokenReplies: settings.spokenReplies,
    },
  );
  const vision = new VisionHandler(
    deps.adapters.vision,
    {
      adapterTimeoutMs: settings.adapterTimeoutMs,
      maxFacesPerFrame: settings.maxFacesPerFrame,
    },
    eventBus,
  );
  const rooms = new RoomHandler(deps.registry, {
    defaultRoom: settings.defaultRoom,
    excludeSender: settings.excludeSenderOnBroadcast,
  });

  return router
    .register("ping", PingSchema, async (ctx) => {
      await ctx.reply({ type: "pong" });
    })
    .register("voice_command", VoiceCommandSchema, (ctx, env) =>
      voice.handleVoiceCommand(ctx, env),
    )
    .register("audio_chunk", AudioChunkSchema, (ctx, env) =>
      voice.handleAudioChunk(ctx, env),
    )
    .register("camera_frame", CameraFrameSchema, (ctx, env) =>
      vision.handleCameraFrame(ctx, env),
    )
    .register("join_room", JoinRoomSchema, (ctx, env) => rooms.handleJoin(ctx, env))
    .register("leave_room", LeaveRoomSchema, (ctx, env) => rooms.handleLeave(ctx, env))
    .register("broadcast", BroadcastSchema, (ctx, env) =>
      rooms.handleBroadcast(ctx, env),
    );
}

export { RoomHandler } from "./RoomHandler.js";
export { VisionHandler } from "./VisionHandler.js";
export { VoiceHandler } from "./VoiceHandler.js";
