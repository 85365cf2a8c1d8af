/**
 * Vision Handler - camera_frame envelopes
 */

import { v4 as uuidv4 } from "uuid";
import { EventBus } from "../orchestrator/EventBus.js";
import type { DispatchContext } from "../orchestrator/MessageRouter.js";
import { guardAdapterCall } from "../providers/guard.js";
import {
  NEUTRAL_EMOTION,
  UNKNOWN_FACE,
  type EmotionResult,
  type FaceRecognition,
  type VisionAdapter,
} from "../providers/InferenceAdapters.js";
import type { CameraFrameEnvelope } from "../schemas/envelopes.js";
import { ProtocolError } from "../schemas/errors.js";
import type { VisionEvent } from "../schemas/events.js";
import { decodeBase64Payload } from "../utils/base64.js";

export interface VisionHandlerOptions {
  adapterTimeoutMs: number;
  /** Only the first N detected faces are run through recognition */
  maxFacesPerFrame: number;
}

export class VisionHandler {
  constructor(
    private readonly vision: VisionAdapter,
    private readonly options: VisionHandlerOptions,
    private readonly eventBus: EventBus | null = null,
  ) {}

  async handleCameraFrame(
    ctx: DispatchContext,
    envelope: CameraFrameEnvelope,
  ): Promise<void> {
    if (!envelope.frame) {
      throw new ProtocolError("Missing camera frame");
    }

    const image = decodeBase64Payload(envelope.frame, "frame");
    const timeoutMs = this.options.adapterTimeoutMs;

    const faces = await guardAdapterCall(
      "vision.detectFaces",
      () => this.vision.detectFaces(image),
      [],
      timeoutMs,
    );

    const recognize = Promise.all(
      faces.slice(0, this.options.maxFacesPerFrame).map((face) =>
        guardAdapterCall<FaceRecognition>(
          "vision.recognizeFace",
          () => this.vision.recognizeFace(image, face.bbox),
          { ...UNKNOWN_FACE },
          timeoutMs,
        ),
      ),
    );
    const detectEmotion: Promise<EmotionResult | null> =
      faces.length > 0
        ? guardAdapterCall<EmotionResult>(
            "vision.detectEmotion",
            () => this.vision.detectEmotion(image),
            { ...NEUTRAL_EMOTION, all_emotions: {} },
            timeoutMs,
          )
        : Promise.resolve(null);

    const [recognition, emotion] = await Promise.all([recognize, detectEmotion]);

    if (faces.length > 0) {
      this.publish(ctx, {
        type: "vision.faces_detected",
        source: "vision",
        payload: { count: faces.length },
      });
    }
    if (emotion) {
      this.publish(ctx, {
        type: "vision.emotion_detected",
        source: "vision",
        payload: { emotion: emotion.emotion, confidence: emotion.confidence },
      });
    }

    await ctx.reply({
      type: "vision_update",
      faces,
      recognition,
      emotion,
    });
  }

  private publish(
    ctx: DispatchContext,
    event: Pick<VisionEvent, "type" | "source" | "payload">,
  ): void {
    this.eventBus?.emit({
      ...event,
      event_id: uuidv4(),
      connection_id: ctx.connectionId,
      t_ms: Date.now(),
    });
  }
}
