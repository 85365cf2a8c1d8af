/**
 * Configuration loader for the realtime assistant server
 */

import { config as loadEnv } from "dotenv";
import { dirname, resolve } from "path";
import { existsSync } from "fs";

/**
 * Nearest directory at or above `startDir` holding a package.json.
 * Falls back to the working directory.
 */
export function findProjectRoot(startDir: string): string {
  let dir = startDir;
  for (;;) {
    if (existsSync(resolve(dir, "package.json"))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return process.cwd();
    }
    dir = parent;
  }
}

const currentDir = process.cwd();
const projectRoot = findProjectRoot(__dirname);

// Project root first, then the working directory
const envPaths = [...new Set([resolve(projectRoot, ".env"), resolve(currentDir, ".env")])];

let envLoaded = false;
for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    const result = loadEnv({ path: envPath });
    if (!result.error) {
      console.log(`✓ Loaded environment variables from: ${envPath}`);
      envLoaded = true;
      break;
    }
  }
}

if (!envLoaded) {
  console.warn("⚠ No .env file found in expected locations:");
  envPaths.forEach((p) => console.warn(`  - ${p}`));
  console.warn("Continuing with environment variables from shell/system...");
}

export type TtsVoice = "alloy" | "echo" | "fable" | "onyx" | "nova" | "shimmer";

export const TTS_VOICES: readonly TtsVoice[] = [
  "alloy",
  "echo",
  "fable",
  "onyx",
  "nova",
  "shimmer",
];

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  auth: {
    jwtSecret: string;
    algorithm: "HS256" | "HS384" | "HS512";
  };
  openai: {
    apiKey: string;
    chatModel: string;
    transcriptionModel: string;
    ttsModel: string;
    ttsVoice: TtsVoice;
    temperature: number;
    maxTokens: number;
  };
  vision: {
    serviceUrl: string;
    recognitionThreshold: number;
    requestTimeoutMs: number;
  };
  realtime: {
    path: string;
    defaultRoom: string;
    welcomeMessage: string;
    excludeSenderOnBroadcast: boolean;
    maxOutboundQueue: number;
    maxInboundQueue: number;
    adapterTimeoutMs: number;
    maxFacesPerFrame: number;
    defaultLanguage: string;
    exposeErrorDetails: boolean;
    roomSweepThreshold: number;
  };
  storage: {
    databasePath: string;
    enableWalMode: boolean;
    maxHistoryTurns: number;
  };
  features: {
    enablePersistentMemory: boolean;
    enableSpokenReplies: boolean;
  };
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value) return value;
  if (defaultValue === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return defaultValue;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === "true";
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new Error(`Invalid number for ${key}: ${value}`);
  }
  return num;
}

export function isTtsVoice(value: string): value is TtsVoice {
  return TTS_VOICES.some((voice) => voice === value);
}

function getEnvVoice(key: string, defaultValue: TtsVoice): TtsVoice {
  const value = process.env[key];
  if (!value) return defaultValue;

  const normalized = value.trim().toLowerCase();
  if (isTtsVoice(normalized)) {
    return normalized;
  }

  console.warn(
    `[Config] Invalid ${key}="${value}". Using default "${defaultValue}".`,
  );
  return defaultValue;
}

function getEnvAlgorithm(
  key: string,
  defaultValue: ServerConfig["auth"]["algorithm"],
): ServerConfig["auth"]["algorithm"] {
  const value = process.env[key];
  if (value === "HS256" || value === "HS384" || value === "HS512") {
    return value;
  }
  if (value) {
    console.warn(
      `[Config] Unsupported ${key}="${value}". Using default "${defaultValue}".`,
    );
  }
  return defaultValue;
}

const nodeEnv = getEnvVar("NODE_ENV", "development");

export const config: ServerConfig = {
  port: getEnvNumber("PORT", 3000),
  nodeEnv,
  auth: {
    jwtSecret: getEnvVar("JWT_SECRET", "development-secret"),
    algorithm: getEnvAlgorithm("JWT_ALGORITHM", "HS256"),
  },
  openai: {
    // Empty key puts the OpenAI-backed adapters in mock mode
    apiKey: getEnvVar("OPENAI_API_KEY", ""),
    chatModel: getEnvVar("OPENAI_CHAT_MODEL", "gpt-4o-mini"),
    transcriptionModel: getEnvVar("OPENAI_TRANSCRIPTION_MODEL", "whisper-1"),
    ttsModel: getEnvVar("OPENAI_TTS_MODEL", "tts-1"),
    ttsVoice: getEnvVoice("OPENAI_TTS_VOICE", "fable"),
    temperature: getEnvNumber("LLM_TEMPERATURE", 0.7),
    maxTokens: getEnvNumber("LLM_MAX_TOKENS", 800),
  },
  vision: {
    serviceUrl: getEnvVar("VISION_SERVICE_URL", ""),
    recognitionThreshold: getEnvNumber("FACE_RECOGNITION_THRESHOLD", 0.7),
    requestTimeoutMs: getEnvNumber("VISION_REQUEST_TIMEOUT_MS", 8000),
  },
  realtime: {
    path: getEnvVar("WS_PATH", "/ws/connect"),
    defaultRoom: getEnvVar("DEFAULT_ROOM", "main"),
    welcomeMessage: getEnvVar(
      "WELCOME_MESSAGE",
      "Connection established. Assistant online.",
    ),
    excludeSenderOnBroadcast: getEnvBool("EXCLUDE_SENDER_ON_BROADCAST", true),
    maxOutboundQueue: getEnvNumber("MAX_OUTBOUND_QUEUE", 256),
    maxInboundQueue: getEnvNumber("MAX_INBOUND_QUEUE", 64),
    adapterTimeoutMs: getEnvNumber("ADAPTER_TIMEOUT_MS", 10000),
    maxFacesPerFrame: getEnvNumber("MAX_FACES_PER_FRAME", 3),
    defaultLanguage: getEnvVar("DEFAULT_LANGUAGE", "en"),
    exposeErrorDetails: getEnvBool(
      "EXPOSE_ERROR_DETAILS",
      nodeEnv === "development",
    ),
    roomSweepThreshold: getEnvNumber("ROOM_SWEEP_THRESHOLD", 64),
  },
  storage: {
    databasePath: getEnvVar(
      "DATABASE_PATH",
      resolve(currentDir, "data", "assistant.db"),
    ),
    enableWalMode: getEnvBool("DATABASE_WAL_MODE", true),
    maxHistoryTurns: getEnvNumber("MAX_HISTORY_TURNS", 10),
  },
  features: {
    enablePersistentMemory: getEnvBool("ENABLE_PERSISTENT_MEMORY", true),
    enableSpokenReplies: getEnvBool("ENABLE_SPOKEN_REPLIES", true),
  },
};
