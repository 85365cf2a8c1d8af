/**
 * Realtime Assistant Server Entry Point
 */

import { createServer } from 'http';
import { config } from './config/index.js';
import { createApp } from './api/app.js';
import { RealtimeWebSocketServer } from './api/websocket.js';
import { createMessageRouter } from './handlers/index.js';
import { eventBus } from './orchestrator/EventBus.js';
import { SessionRegistry } from './orchestrator/SessionRegistry.js';
import { HttpVisionAdapter } from './providers/HttpVisionAdapter.js';
import type { InferenceAdapters, VisionAdapter } from './providers/InferenceAdapters.js';
import { MockVisionAdapter } from './providers/MockVisionAdapter.js';
import { OpenAIBrainAdapter } from './providers/OpenAIBrainAdapter.js';
import { OpenAIVoiceAdapter } from './providers/OpenAIVoiceAdapter.js';
import { closeDatabase, ConversationStore, getDatabase } from './storage/index.js';

// Storage is optional: the assistant still answers without memory
let conversations: ConversationStore | null = null;
if (config.features.enablePersistentMemory) {
  try {
    conversations = new ConversationStore(
      getDatabase({
        path: config.storage.databasePath,
        walMode: config.storage.enableWalMode,
      }),
    );
    console.log('[Server] Conversation storage initialized');
  } catch (error) {
    console.error('[Server] Failed to initialize storage, memory disabled:', error);
  }
}

const vision: VisionAdapter = config.vision.serviceUrl
  ? new HttpVisionAdapter({
      baseUrl: config.vision.serviceUrl,
      timeoutMs: config.vision.requestTimeoutMs,
      recognitionThreshold: config.vision.recognitionThreshold,
    })
  : new MockVisionAdapter();

const adapters: InferenceAdapters = {
  voice: new OpenAIVoiceAdapter({
    apiKey: config.openai.apiKey,
    transcriptionModel: config.openai.transcriptionModel,
    ttsModel: config.openai.ttsModel,
    defaultVoice: config.openai.ttsVoice,
    defaultLanguage: config.realtime.defaultLanguage,
  }),
  vision,
  brain: new OpenAIBrainAdapter({
    apiKey: config.openai.apiKey,
    model: config.openai.chatModel,
    temperature: config.openai.temperature,
    maxTokens: config.openai.maxTokens,
    historyTurns: config.storage.maxHistoryTurns,
    memory: conversations,
  }),
};

const registry = new SessionRegistry({
  welcomeMessage: config.realtime.welcomeMessage,
  maxOutboundQueue: config.realtime.maxOutboundQueue,
  roomSweepThreshold: config.realtime.roomSweepThreshold,
  eventBus,
});

const router = createMessageRouter(
  { registry, adapters, conversations, eventBus },
  {
    defaultRoom: config.realtime.defaultRoom,
    excludeSenderOnBroadcast: config.realtime.excludeSenderOnBroadcast,
    adapterTimeoutMs: config.realtime.adapterTimeoutMs,
    maxFacesPerFrame: config.realtime.maxFacesPerFrame,
    defaultLanguage: config.realtime.defaultLanguage,
    spokenReplies: config.features.enableSpokenReplies,
    exposeErrorDetails: config.realtime.exposeErrorDetails,
  },
);

const app = createApp({
  registry,
  adapters,
  eventBus,
  defaultLanguage: config.realtime.defaultLanguage,
  exposeErrorDetails: config.realtime.exposeErrorDetails,
  features: { ...config.features },
});
const server = createServer(app);

const wsServer = new RealtimeWebSocketServer(server, registry, router, {
  path: config.realtime.path,
  defaultRoom: config.realtime.defaultRoom,
  maxInboundQueue: config.realtime.maxInboundQueue,
  exposeErrorDetails: config.realtime.exposeErrorDetails,
  auth: config.auth,
});

server.listen(config.port, () => {
  console.log(`\n[Server] Realtime assistant listening on port ${config.port}`);
  console.log(`[Server] Environment: ${config.nodeEnv}`);
  console.log(`[Server] WebSocket: ws://localhost:${config.port}${config.realtime.path}`);
  console.log(`[Server] Health: http://localhost:${config.port}/health`);
  console.log(`[Server] Status: http://localhost:${config.port}/status\n`);

  console.log('Adapters:');
  console.log(`  Voice: ${adapters.voice.status().mockMode ? 'mock' : 'openai'}`);
  console.log(`  Brain: ${adapters.brain.status().mockMode ? 'canned replies' : config.openai.chatModel}`);
  console.log(`  Vision: ${adapters.vision.status().mockMode ? 'mock' : config.vision.serviceUrl}`);
  console.log(`  Memory: ${conversations ? '✓' : '✗'}\n`);
});

let shuttingDown = false;

function shutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`\n[Server] ${signal} received, shutting down gracefully...`);

  void wsServer
    .shutdown()
    .catch((error) => console.error('[Server] WebSocket shutdown failed:', error))
    .finally(() => {
      server.close(() => {
        closeDatabase();
        console.log('[Server] HTTP server closed');
        process.exit(0);
      });
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
