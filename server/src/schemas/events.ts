/**
 * Domain event schema published on the EventBus
 */

export type EventSource = "registry" | "dispatch" | "voice" | "vision" | "brain";

export interface BaseEvent {
  event_id: string;
  connection_id: string;
  t_ms: number;
  source: EventSource;
  type: string;
  payload: unknown;
}

// Connection lifecycle
export interface ConnectionOpenPayload {
  user_id: string | null;
  username: string;
}

export interface ConnectionClosePayload {
  reason: string;
  rooms: string[];
  duration_ms: number;
}

export interface ConnectionEvent extends BaseEvent {
  type: "connection.open" | "connection.close";
  source: "registry";
  payload: ConnectionOpenPayload | ConnectionClosePayload;
}

// Room membership
export interface RoomPayload {
  room: string;
}

export interface RoomEvent extends BaseEvent {
  type: "room.joined" | "room.left";
  source: "registry";
  payload: RoomPayload;
}

// Voice
export interface VoiceCommandPayload {
  text: string;
}

export interface VoiceResponsePayload {
  intent: string;
  confidence: number;
  has_audio: boolean;
}

export interface VoiceEvent extends BaseEvent {
  type: "voice.command_received" | "voice.response_generated";
  source: "voice" | "brain";
  payload: VoiceCommandPayload | VoiceResponsePayload;
}

// Vision
export interface FacesDetectedPayload {
  count: number;
}

export interface EmotionDetectedPayload {
  emotion: string;
  confidence: number;
}

export interface VisionEvent extends BaseEvent {
  type: "vision.faces_detected" | "vision.emotion_detected";
  source: "vision";
  payload: FacesDetectedPayload | EmotionDetectedPayload;
}

// Dispatch failures
export interface DispatchErrorPayload {
  message_type: string;
  error: string;
}

export interface DispatchErrorEvent extends BaseEvent {
  type: "dispatch.error";
  source: "dispatch";
  payload: DispatchErrorPayload;
}

export type Event =
  | ConnectionEvent
  | RoomEvent
  | VoiceEvent
  | VisionEvent
  | DispatchErrorEvent;
