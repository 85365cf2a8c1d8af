/**
 * Wire envelopes exchanged over the realtime WebSocket channel
 *
 * Inbound envelopes are validated with zod. Outbound envelopes are stamped
 * with a server-side ISO-8601 timestamp by the SessionRegistry at send time.
 */

import { z } from "zod";
import type {
  CommandAction,
  EmotionResult,
  FaceDetection,
  FaceRecognition,
} from "../providers/InferenceAdapters.js";

// ── Inbound ─────────────────────────────────────────────────────────────

export const EnvelopeBaseSchema = z
  .object({
    type: z.string().min(1),
  })
  .passthrough();

export type InboundEnvelope = z.infer<typeof EnvelopeBaseSchema>;

export const PingSchema = z.object({
  type: z.literal("ping"),
});

export const VoiceCommandSchema = z.object({
  type: z.literal("voice_command"),
  text: z.string().default(""),
  context: z.record(z.unknown()).optional(),
});

export const CameraFrameSchema = z.object({
  type: z.literal("camera_frame"),
  frame: z.string().optional(),
});

export const AudioChunkSchema = z.object({
  type: z.literal("audio_chunk"),
  audio: z.string().optional(),
  is_final: z.boolean().default(false),
  language: z.string().min(2).max(8).optional(),
});

export const JoinRoomSchema = z.object({
  type: z.literal("join_room"),
  room: z.string().min(1).max(128).optional(),
});

export const LeaveRoomSchema = z.object({
  type: z.literal("leave_room"),
  room: z.string().min(1).max(128).optional(),
});

export const BroadcastSchema = z.object({
  type: z.literal("broadcast"),
  room: z.string().min(1).max(128).optional(),
  message: z.unknown().optional(),
});

export type VoiceCommandEnvelope = z.infer<typeof VoiceCommandSchema>;
export type CameraFrameEnvelope = z.infer<typeof CameraFrameSchema>;
export type AudioChunkEnvelope = z.infer<typeof AudioChunkSchema>;
export type JoinRoomEnvelope = z.infer<typeof JoinRoomSchema>;
export type LeaveRoomEnvelope = z.infer<typeof LeaveRoomSchema>;
export type BroadcastRequestEnvelope = z.infer<typeof BroadcastSchema>;

export type ParseResult =
  | { ok: true; envelope: InboundEnvelope }
  | { ok: false; message: string; details?: string };

/**
 * Decode a raw text frame into an envelope with a string `type`
 */
export function parseEnvelope(raw: string): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      ok: false,
      message: "Invalid message format",
      details: error instanceof Error ? error.message : String(error),
    };
  }

  const result = EnvelopeBaseSchema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      message: "Invalid message format",
      details: formatIssues(result.error),
    };
  }
  return { ok: true, envelope: result.data };
}

/**
 * Flatten zod issues into one line: "path: message; path: message"
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

// ── Outbound ────────────────────────────────────────────────────────────

export interface SystemEnvelope {
  type: "system";
  event: "connected";
  message: string;
  connection_id: string;
  user_id: string | null;
  username: string;
}

export interface PongEnvelope {
  type: "pong";
}

export interface ErrorEnvelope {
  type: "error";
  message: string;
  details?: string;
}

export interface VoiceResponseEnvelope {
  type: "voice_response";
  text: string;
  intent: string;
  actions: CommandAction[];
  confidence: number;
  audio?: string;
}

export interface TranscriptionEnvelope {
  type: "transcription";
  text: string;
  is_final: boolean;
  confidence: number;
  language: string;
}

export interface VisionUpdateEnvelope {
  type: "vision_update";
  faces: FaceDetection[];
  recognition: FaceRecognition[];
  emotion: EmotionResult | null;
}

export interface RoomAckEnvelope {
  type: "room_joined" | "room_left";
  room: string;
}

export interface BroadcastEnvelope {
  type: "broadcast";
  from: string;
  from_connection: string;
  room: string;
  message: unknown;
}

export type OutboundEnvelope =
  | SystemEnvelope
  | PongEnvelope
  | ErrorEnvelope
  | VoiceResponseEnvelope
  | TranscriptionEnvelope
  | VisionUpdateEnvelope
  | RoomAckEnvelope
  | BroadcastEnvelope;

export type StampedEnvelope = OutboundEnvelope & { timestamp: string };
