/**
 * OpenAI Voice Adapter
 *
 * Speech-to-text through the transcription endpoint and text-to-speech
 * through the speech endpoint. Without an API key the adapter runs in mock
 * mode: canned transcripts, no synthesized audio.
 */

import OpenAI, { toFile } from "openai";
import { z } from "zod";
import { isTtsVoice, type TtsVoice } from "../config/index.js";
import type {
  SpeechEmotion,
  SynthesisOptions,
  TranscriptSegment,
  TranscriptionResult,
  VoiceAdapter,
  VoiceStatus,
} from "./InferenceAdapters.js";

export interface OpenAIVoiceOptions {
  apiKey: string;
  transcriptionModel: string;
  ttsModel: string;
  defaultVoice: TtsVoice;
  defaultLanguage?: string;
  /** Synthesized replies kept for reuse; the least recently used goes first */
  maxCacheEntries?: number;
}

const SPEED_BY_EMOTION: Record<SpeechEmotion, number> = {
  neutral: 1.0,
  urgent: 1.15,
  calm: 0.9,
};

export const MOCK_TRANSCRIPT = "Hello, this is a test transcription.";

// verbose_json carries more than the SDK's Transcription type declares
const VerboseTranscriptionSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  segments: z
    .array(
      z.object({
        start: z.number(),
        end: z.number(),
        text: z.string(),
        avg_logprob: z.number().optional(),
      }),
    )
    .optional(),
});

/**
 * exp(mean avg_logprob), clamped to [0, 1]. 0.5 when nothing to average.
 */
export function estimateConfidence(segments: TranscriptSegment[]): number {
  const logprobs = segments
    .map((segment) => segment.avgLogprob)
    .filter((value): value is number => typeof value === "number");
  if (logprobs.length === 0) {
    return 0.5;
  }
  const mean = logprobs.reduce((sum, value) => sum + value, 0) / logprobs.length;
  return Math.min(1, Math.max(0, Math.exp(mean)));
}

export class OpenAIVoiceAdapter implements VoiceAdapter {
  private client: OpenAI | null;
  private options: Required<OpenAIVoiceOptions>;
  private cache: Map<string, Buffer> = new Map();

  constructor(options: OpenAIVoiceOptions) {
    this.options = {
      ...options,
      defaultLanguage: options.defaultLanguage ?? "en",
      maxCacheEntries: options.maxCacheEntries ?? 64,
    };
    this.client = options.apiKey ? new OpenAI({ apiKey: options.apiKey }) : null;

    if (!this.client) {
      console.warn("[VoiceAdapter] No OpenAI API key, running in mock mode");
    }
  }

  async transcribe(audio: Buffer, language?: string): Promise<TranscriptionResult> {
    const lang = language ?? this.options.defaultLanguage;

    if (!this.client) {
      return {
        text: MOCK_TRANSCRIPT,
        language: lang,
        confidence: 0.95,
        segments: [],
      };
    }

    try {
      const response = await this.client.audio.transcriptions.create({
        file: await toFile(audio, "audio.wav"),
        model: this.options.transcriptionModel,
        language: lang,
        response_format: "verbose_json",
      });

      const parsed = VerboseTranscriptionSchema.safeParse(response);
      if (!parsed.success) {
        console.warn("[VoiceAdapter] Unexpected transcription payload");
        return lowConfidence(lang);
      }

      const segments: TranscriptSegment[] = (parsed.data.segments ?? []).map(
        (segment) => ({
          start: segment.start,
          end: segment.end,
          text: segment.text,
          avgLogprob: segment.avg_logprob,
        }),
      );

      return {
        text: parsed.data.text.trim(),
        language: parsed.data.language ?? lang,
        confidence: estimateConfidence(segments),
        segments,
      };
    } catch (error) {
      console.error("[VoiceAdapter] Transcription failed:", error);
      return lowConfidence(lang);
    }
  }

  async synthesize(text: string, options: SynthesisOptions = {}): Promise<Buffer | null> {
    if (!this.client) {
      return null;
    }

    const voice =
      options.speaker && isTtsVoice(options.speaker)
        ? options.speaker
        : this.options.defaultVoice;
    const emotion = options.emotion ?? "neutral";
    const speed = SPEED_BY_EMOTION[emotion];

    const cacheKey = `${text}:${voice}:${emotion}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      // Re-insert so Map order tracks recency
      this.cache.delete(cacheKey);
      this.cache.set(cacheKey, cached);
      return cached;
    }

    try {
      const response = await this.client.audio.speech.create({
        model: this.options.ttsModel,
        voice,
        input: text,
        response_format: "wav",
        speed,
      });

      const buffer = Buffer.from(await response.arrayBuffer());
      this.remember(cacheKey, buffer);
      console.log(`[VoiceAdapter] Synthesized ${buffer.length} bytes (${voice})`);
      return buffer;
    } catch (error) {
      console.error("[VoiceAdapter] Speech synthesis failed:", error);
      return null;
    }
  }

  clearCache(): void {
    this.cache.clear();
  }

  cacheSize(): number {
    return this.cache.size;
  }

  private remember(key: string, audio: Buffer): void {
    if (this.options.maxCacheEntries <= 0) {
      return;
    }
    this.cache.set(key, audio);
    while (this.cache.size > this.options.maxCacheEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }

  status(): VoiceStatus {
    const live = this.client !== null;
    return {
      ready: true,
      mockMode: !live,
      sttAvailable: true,
      ttsAvailable: live,
    };
  }
}

function lowConfidence(language: string): TranscriptionResult {
  return { text: "", language, confidence: 0, segments: [] };
}
