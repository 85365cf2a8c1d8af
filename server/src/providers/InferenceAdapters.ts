/**
 * Inference adapter contracts
 *
 * Speech, vision and language services are consumed through these
 * interfaces. Implementations fail soft: a failing backend yields a
 * degraded result instead of a thrown error.
 */

// ── Voice ───────────────────────────────────────────────────────────────

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
  avgLogprob?: number;
}

export interface TranscriptionResult {
  text: string;
  language: string;
  confidence: number;
  segments: TranscriptSegment[];
}

export type SpeechEmotion = "neutral" | "urgent" | "calm";

export interface SynthesisOptions {
  speaker?: string;
  language?: string;
  emotion?: SpeechEmotion;
}

export interface VoiceStatus {
  ready: boolean;
  mockMode: boolean;
  sttAvailable: boolean;
  ttsAvailable: boolean;
}

export interface VoiceAdapter {
  transcribe(audio: Buffer, language?: string): Promise<TranscriptionResult>;
  /** Resolves null when synthesis is unavailable */
  synthesize(text: string, options?: SynthesisOptions): Promise<Buffer | null>;
  status(): VoiceStatus;
}

// ── Vision ──────────────────────────────────────────────────────────────

/** [x1, y1, x2, y2] in pixels */
export type BoundingBox = [number, number, number, number];

export interface FaceDetection {
  id: string;
  bbox: BoundingBox;
  confidence: number;
  landmarks?: number[][];
}

export interface FaceRecognition {
  identity: string;
  confidence: number;
  distance?: number;
}

export interface EmotionResult {
  emotion: string;
  confidence: number;
  all_emotions: Record<string, number>;
}

export interface VisionStatus {
  ready: boolean;
  mockMode: boolean;
  registeredFaces: number | null;
}

export interface VisionAdapter {
  detectFaces(image: Buffer): Promise<FaceDetection[]>;
  recognizeFace(image: Buffer, bbox?: BoundingBox): Promise<FaceRecognition>;
  detectEmotion(image: Buffer): Promise<EmotionResult>;
  registerFace(userId: string, image: Buffer): Promise<boolean>;
  status(): VisionStatus;
}

export const UNKNOWN_FACE: FaceRecognition = {
  identity: "unknown",
  confidence: 0,
};

export const NEUTRAL_EMOTION: EmotionResult = {
  emotion: "neutral",
  confidence: 0,
  all_emotions: {},
};

// ── Brain ───────────────────────────────────────────────────────────────

export interface CommandAction {
  type: "execute" | "create";
  details: string;
}

export interface CommandResult {
  text: string;
  intent: string;
  actions: CommandAction[];
  confidence: number;
  timestamp: string;
}

export interface BrainStatus {
  ready: boolean;
  mockMode: boolean;
  model: string | null;
}

export interface BrainAdapter {
  processCommand(
    text: string,
    userId: string,
    context?: Record<string, unknown>,
  ): Promise<CommandResult>;
  status(): BrainStatus;
}

export interface InferenceAdapters {
  voice: VoiceAdapter;
  vision: VisionAdapter;
  brain: BrainAdapter;
}
