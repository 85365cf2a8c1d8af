/**
 * OpenAIVoiceAdapter Unit Tests
 *
 * The openai SDK is mocked; the adapter's request shapes, response parsing,
 * caching and mock mode are checked without any network access.
 */

const mockTranscriptionsCreate = jest.fn();
const mockSpeechCreate = jest.fn();

jest.mock("openai", () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    audio: {
      transcriptions: {
        create: (...args: unknown[]) => mockTranscriptionsCreate(...args),
      },
      speech: {
        create: (...args: unknown[]) => mockSpeechCreate(...args),
      },
    },
  })),
  toFile: jest.fn(async (data: Buffer, name: string) => ({ name, size: data.length })),
}));

import OpenAI from "openai";
import {
  estimateConfidence,
  MOCK_TRANSCRIPT,
  OpenAIVoiceAdapter,
} from "../../providers/OpenAIVoiceAdapter.js";

function createAdapter(apiKey = "test-api-key", maxCacheEntries?: number): OpenAIVoiceAdapter {
  return new OpenAIVoiceAdapter({
    apiKey,
    transcriptionModel: "whisper-1",
    ttsModel: "tts-1",
    defaultVoice: "fable",
    maxCacheEntries,
  });
}

function speechResponse(bytes: number[]) {
  return {
    arrayBuffer: async () => new Uint8Array(bytes).buffer,
  };
}

describe("OpenAIVoiceAdapter", () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, "log").mockImplementation();
    jest.spyOn(console, "warn").mockImplementation();
    jest.spyOn(console, "error").mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("mock mode", () => {
    it("should not create a client without an API key", () => {
      const adapter = createAdapter("");

      expect(OpenAI).not.toHaveBeenCalled();
      expect(adapter.status()).toEqual({
        ready: true,
        mockMode: true,
        sttAvailable: true,
        ttsAvailable: false,
      });
    });

    it("should return the canned transcript", async () => {
      const adapter = createAdapter("");

      await expect(adapter.transcribe(Buffer.from("audio"), "fr")).resolves.toEqual({
        text: MOCK_TRANSCRIPT,
        language: "fr",
        confidence: 0.95,
        segments: [],
      });
    });

    it("should not synthesize speech", async () => {
      const adapter = createAdapter("");

      await expect(adapter.synthesize("hello")).resolves.toBeNull();
      expect(mockSpeechCreate).not.toHaveBeenCalled();
    });
  });

  describe("transcribe()", () => {
    it("should request verbose JSON and map the segments", async () => {
      mockTranscriptionsCreate.mockResolvedValue({
        text: " turn on the lights ",
        language: "english",
        segments: [{ start: 0, end: 1.2, text: "turn on the lights", avg_logprob: -0.1 }],
      });
      const adapter = createAdapter();

      const result = await adapter.transcribe(Buffer.from("audio"));

      expect(mockTranscriptionsCreate).toHaveBeenCalledWith({
        file: { name: "audio.wav", size: 5 },
        model: "whisper-1",
        language: "en",
        response_format: "verbose_json",
      });
      expect(result.text).toBe("turn on the lights");
      expect(result.language).toBe("english");
      expect(result.segments).toEqual([
        { start: 0, end: 1.2, text: "turn on the lights", avgLogprob: -0.1 },
      ]);
      expect(result.confidence).toBeCloseTo(Math.exp(-0.1), 6);
    });

    it("should fall back to the requested language when none is reported", async () => {
      mockTranscriptionsCreate.mockResolvedValue({ text: "hola" });
      const adapter = createAdapter();

      const result = await adapter.transcribe(Buffer.from("audio"), "es");

      expect(result).toEqual({ text: "hola", language: "es", confidence: 0.5, segments: [] });
    });

    it("should return an empty transcript for an unexpected payload", async () => {
      mockTranscriptionsCreate.mockResolvedValue({ transcript: "wrong shape" });
      const adapter = createAdapter();

      await expect(adapter.transcribe(Buffer.from("audio"))).resolves.toEqual({
        text: "",
        language: "en",
        confidence: 0,
        segments: [],
      });
    });

    it("should return an empty transcript when the request fails", async () => {
      mockTranscriptionsCreate.mockRejectedValue(new Error("429 rate limited"));
      const adapter = createAdapter();

      const result = await adapter.transcribe(Buffer.from("audio"));

      expect(result.text).toBe("");
      expect(result.confidence).toBe(0);
    });
  });

  describe("synthesize()", () => {
    it("should request wav audio with the default voice", async () => {
      mockSpeechCreate.mockResolvedValue(speechResponse([1, 2, 3]));
      const adapter = createAdapter();

      const audio = await adapter.synthesize("Hello");

      expect(audio).toEqual(Buffer.from([1, 2, 3]));
      expect(mockSpeechCreate).toHaveBeenCalledWith({
        model: "tts-1",
        voice: "fable",
        input: "Hello",
        response_format: "wav",
        speed: 1.0,
      });
      expect(adapter.status().ttsAvailable).toBe(true);
    });

    it("should honour a supported speaker and adjust speed for emotion", async () => {
      mockSpeechCreate.mockResolvedValue(speechResponse([1]));
      const adapter = createAdapter();

      await adapter.synthesize("Move now", { speaker: "nova", emotion: "urgent" });
      await adapter.synthesize("Breathe", { speaker: "robot", emotion: "calm" });

      expect(mockSpeechCreate.mock.calls[0][0]).toMatchObject({ voice: "nova", speed: 1.15 });
      expect(mockSpeechCreate.mock.calls[1][0]).toMatchObject({ voice: "fable", speed: 0.9 });
    });

    it("should serve repeated requests from the cache until cleared", async () => {
      mockSpeechCreate.mockResolvedValue(speechResponse([7]));
      const adapter = createAdapter();

      await adapter.synthesize("Hello");
      await adapter.synthesize("Hello");
      expect(mockSpeechCreate).toHaveBeenCalledTimes(1);

      adapter.clearCache();
      await adapter.synthesize("Hello");
      expect(mockSpeechCreate).toHaveBeenCalledTimes(2);
    });

    it("should evict the least recently used reply once the cache is full", async () => {
      mockSpeechCreate.mockResolvedValue(speechResponse([7]));
      const adapter = createAdapter("test-api-key", 2);

      await adapter.synthesize("one");
      await adapter.synthesize("two");
      await adapter.synthesize("one");
      await adapter.synthesize("three");
      expect(mockSpeechCreate).toHaveBeenCalledTimes(3);
      expect(adapter.cacheSize()).toBe(2);

      await adapter.synthesize("one");
      expect(mockSpeechCreate).toHaveBeenCalledTimes(3);

      await adapter.synthesize("two");
      expect(mockSpeechCreate).toHaveBeenCalledTimes(4);
      expect(adapter.cacheSize()).toBe(2);
    });

    it("should stay bounded over many distinct replies", async () => {
      mockSpeechCreate.mockResolvedValue(speechResponse([1, 2]));
      const adapter = createAdapter();

      for (let i = 0; i < 200; i++) {
        await adapter.synthesize(`reply ${i}`);
      }

      expect(adapter.cacheSize()).toBe(64);
    });

    it("should return null when the request fails", async () => {
      mockSpeechCreate.mockRejectedValue(new Error("500"));
      const adapter = createAdapter();

      await expect(adapter.synthesize("Hello")).resolves.toBeNull();
    });
  });
});

describe("estimateConfidence", () => {
  it("should be 0.5 without log probabilities", () => {
    expect(estimateConfidence([])).toBe(0.5);
    expect(estimateConfidence([{ start: 0, end: 1, text: "a" }])).toBe(0.5);
  });

  it("should average the segments and clamp to 1", () => {
    expect(
      estimateConfidence([
        { start: 0, end: 1, text: "a", avgLogprob: -0.2 },
        { start: 1, end: 2, text: "b", avgLogprob: 0 },
      ]),
    ).toBeCloseTo(Math.exp(-0.1), 6);
    expect(estimateConfidence([{ start: 0, end: 1, text: "a", avgLogprob: 0.3 }])).toBe(1);
  });
});
