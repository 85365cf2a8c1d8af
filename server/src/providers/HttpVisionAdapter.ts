/**
 * HTTP Vision Adapter
 *
 * Client for an external face/emotion inference service. Images travel as
 * base64 in JSON bodies. Any failure degrades to an empty or neutral result.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { encodeBase64 } from "../utils/base64.js";
import {
  NEUTRAL_EMOTION,
  UNKNOWN_FACE,
  type BoundingBox,
  type EmotionResult,
  type FaceDetection,
  type FaceRecognition,
  type VisionAdapter,
  type VisionStatus,
} from "./InferenceAdapters.js";

export interface HttpVisionOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Recognitions below this confidence are reported as unknown */
  recognitionThreshold: number;
}

const BoundingBoxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

const DetectFacesResponse = z.object({
  faces: z.array(
    z.object({
      id: z.string().optional(),
      bbox: BoundingBoxSchema,
      confidence: z.number(),
      landmarks: z.array(z.array(z.number())).optional(),
    }),
  ),
});

const RecognizeFaceResponse = z.object({
  identity: z.string(),
  confidence: z.number(),
  distance: z.number().optional(),
});

const EmotionResponse = z.object({
  emotion: z.string(),
  confidence: z.number(),
  all_emotions: z.record(z.number()).default({}),
});

const RegisterFaceResponse = z.object({
  success: z.boolean(),
});

export class HttpVisionAdapter implements VisionAdapter {
  private client: AxiosInstance;
  private registeredFaces = 0;
  private lastCallFailed = false;

  constructor(private readonly options: HttpVisionOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: { "Content-Type": "application/json" },
    });
  }

  async detectFaces(image: Buffer): Promise<FaceDetection[]> {
    const data = await this.post(
      "/detect-faces",
      { image: encodeBase64(image) },
      DetectFacesResponse,
    );
    if (!data) return [];

    return data.faces.map((face, index) => ({
      id: face.id ?? `face_${index}`,
      bbox: face.bbox,
      confidence: face.confidence,
      ...(face.landmarks ? { landmarks: face.landmarks } : {}),
    }));
  }

  async recognizeFace(image: Buffer, bbox?: BoundingBox): Promise<FaceRecognition> {
    const data = await this.post(
      "/recognize-face",
      { image: encodeBase64(image), ...(bbox ? { bbox } : {}) },
      RecognizeFaceResponse,
    );
    if (!data) return { ...UNKNOWN_FACE };

    if (data.confidence < this.options.recognitionThreshold) {
      return { ...UNKNOWN_FACE, confidence: data.confidence };
    }
    return data;
  }

  async detectEmotion(image: Buffer): Promise<EmotionResult> {
    const data = await this.post(
      "/detect-emotion",
      { image: encodeBase64(image) },
      EmotionResponse,
    );
    return data ?? { ...NEUTRAL_EMOTION, all_emotions: {} };
  }

  async registerFace(userId: string, image: Buffer): Promise<boolean> {
    const data = await this.post(
      "/register-face",
      { user_id: userId, image: encodeBase64(image) },
      RegisterFaceResponse,
    );
    if (data?.success) {
      this.registeredFaces += 1;
      console.log(`[VisionAdapter] Registered face for user ${userId}`);
      return true;
    }
    return false;
  }

  status(): VisionStatus {
    return {
      ready: !this.lastCallFailed,
      mockMode: false,
      registeredFaces: this.registeredFaces,
    };
  }

  private async post<T>(
    path: string,
    body: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | null> {
    try {
      const response = await this.client.post<unknown>(path, body);
      const parsed = schema.safeParse(response.data);
      if (!parsed.success) {
        console.warn(`[VisionAdapter] Unexpected response from ${path}`);
        this.lastCallFailed = true;
        return null;
      }
      this.lastCallFailed = false;
      return parsed.data;
    } catch (error) {
      const message = axios.isAxiosError(error)
        ? `${error.message}${error.response ? ` (HTTP ${error.response.status})` : ""}`
        : String(error);
      console.error(`[VisionAdapter] ${path} failed: ${message}`);
      this.lastCallFailed = true;
      return null;
    }
  }
}
