/**
 * Vision adapter used when no vision service is configured
 */

import {
  NEUTRAL_EMOTION,
  UNKNOWN_FACE,
  type EmotionResult,
  type FaceDetection,
  type FaceRecognition,
  type VisionAdapter,
  type VisionStatus,
} from "./InferenceAdapters.js";

export class MockVisionAdapter implements VisionAdapter {
  async detectFaces(): Promise<FaceDetection[]> {
    return [];
  }

  async recognizeFace(): Promise<FaceRecognition> {
    return { ...UNKNOWN_FACE };
  }

  async detectEmotion(): Promise<EmotionResult> {
    return { ...NEUTRAL_EMOTION, all_emotions: {} };
  }

  async registerFace(): Promise<boolean> {
    return false;
  }

  status(): VisionStatus {
    return { ready: true, mockMode: true, registeredFaces: null };
  }
}
