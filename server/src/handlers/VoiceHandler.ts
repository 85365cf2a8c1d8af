/**
 * Voice Handler - voice_command and audio_chunk envelopes
 */

import { v4 as uuidv4 } from "uuid";
import { EventBus } from "../orchestrator/EventBus.js";
import type { DispatchContext } from "../orchestrator/MessageRouter.js";
import { guardAdapterCall } from "../providers/guard.js";
import type {
  BrainAdapter,
  CommandResult,
  TranscriptionResult,
  VoiceAdapter,
} from "../providers/InferenceAdapters.js";
import type {
  AudioChunkEnvelope,
  VoiceCommandEnvelope,
  VoiceResponseEnvelope,
} from "../schemas/envelopes.js";
import { ProtocolError } from "../schemas/errors.js";
import type { VoiceEvent } from "../schemas/events.js";
import type { ConversationRepository } from "../storage/ConversationStore.js";
import { decodeBase64Payload, encodeBase64 } from "../utils/base64.js";

export interface VoiceHandlerDeps {
  voice: VoiceAdapter;
  brain: BrainAdapter;
  conversations?: ConversationRepository | null;
  eventBus?: EventBus | null;
}

export interface VoiceHandlerOptions {
  adapterTimeoutMs: number;
  defaultLanguage: string;
  spokenReplies: boolean;
}

export const TIMEOUT_REPLY =
  "I'm sorry, that took too long. Please try again.";

export class VoiceHandler {
  private readonly conversations: ConversationRepository | null;
  private readonly eventBus: EventBus | null;

  constructor(
    private readonly deps: VoiceHandlerDeps,
    private readonly options: VoiceHandlerOptions,
  ) {
    this.conversations = deps.conversations ?? null;
    this.eventBus = deps.eventBus ?? null;
  }

  async handleVoiceCommand(
    ctx: DispatchContext,
    envelope: VoiceCommandEnvelope,
  ): Promise<void> {
    const text = envelope.text.trim();
    if (!text) {
      throw new ProtocolError("Empty command");
    }

    this.publish(ctx, {
      type: "voice.command_received",
      source: "voice",
      payload: { text },
    });

    const result = await guardAdapterCall(
      "brain.processCommand",
      () => this.deps.brain.processCommand(text, ctx.userId ?? "anonymous", envelope.context),
      this.timedOutResult(),
      this.options.adapterTimeoutMs,
    );

    this.persistExchange(ctx, text, result);

    const reply: VoiceResponseEnvelope = {
      type: "voice_response",
      text: result.text,
      intent: result.intent,
      actions: result.actions,
      confidence: result.confidence,
    };

    if (this.options.spokenReplies && result.text) {
      const audio = await guardAdapterCall(
        "voice.synthesize",
        () => this.deps.voice.synthesize(result.text),
        null,
        this.options.adapterTimeoutMs,
      );
      if (audio) {
        reply.audio = encodeBase64(audio);
      }
    }

    await ctx.reply(reply);
    this.publish(ctx, {
      type: "voice.response_generated",
      source: "brain",
      payload: {
        intent: result.intent,
        confidence: result.confidence,
        has_audio: reply.audio !== undefined,
      },
    });
  }

  async handleAudioChunk(
    ctx: DispatchContext,
    envelope: AudioChunkEnvelope,
  ): Promise<void> {
    if (!envelope.audio) {
      throw new ProtocolError("Missing audio data");
    }

    const audio = decodeBase64Payload(envelope.audio, "audio");
    const language = envelope.language ?? this.options.defaultLanguage;
    const placeholder: TranscriptionResult = {
      text: "",
      language,
      confidence: 0,
      segments: [],
    };

    const transcription = await guardAdapterCall(
      "voice.transcribe",
      () => this.deps.voice.transcribe(audio, language),
      placeholder,
      this.options.adapterTimeoutMs,
    );

    await ctx.reply({
      type: "transcription",
      text: transcription.text,
      is_final: envelope.is_final,
      confidence: transcription.confidence,
      language: transcription.language,
    });

    // A final chunk continues down the voice_command path
    if (envelope.is_final && transcription.text.trim()) {
      await this.handleVoiceCommand(ctx, {
        type: "voice_command",
        text: transcription.text,
      });
    }
  }

  private timedOutResult(): CommandResult {
    return {
      text: TIMEOUT_REPLY,
      intent: "error",
      actions: [],
      confidence: 0,
      timestamp: new Date().toISOString(),
    };
  }

  private persistExchange(
    ctx: DispatchContext,
    text: string,
    result: CommandResult,
  ): void {
    if (!this.conversations) return;

    const timestampMs = ctx.receivedAt.getTime();
    try {
      this.conversations.saveExchange([
        {
          connectionId: ctx.connectionId,
          userId: ctx.userId,
          role: "user",
          content: text,
          timestampMs,
        },
        {
          connectionId: ctx.connectionId,
          userId: ctx.userId,
          role: "assistant",
          content: result.text,
          intent: result.intent,
          confidence: result.confidence,
          timestampMs: timestampMs + 1,
        },
      ]);
    } catch (error) {
      console.error("[VoiceHandler] Failed to persist exchange:", error);
    }
  }

  private publish(
    ctx: DispatchContext,
    event: Pick<VoiceEvent, "type" | "source" | "payload">,
  ): void {
    this.eventBus?.emit({
      ...event,
      event_id: uuidv4(),
      connection_id: ctx.connectionId,
      t_ms: Date.now(),
    });
  }
}
