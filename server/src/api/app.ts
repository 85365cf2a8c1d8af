/**
 * Express application: health, status and the /api/v1 inference routes
 */

import express, { type Express } from "express";
import type { EventBus } from "../orchestrator/EventBus.js";
import type { SessionRegistry } from "../orchestrator/SessionRegistry.js";
import type { InferenceAdapters } from "../providers/InferenceAdapters.js";
import { apiErrorHandler, createApiRouter } from "./routes.js";

export const SERVER_VERSION = "1.0.0";

export interface AppDependencies {
  registry: SessionRegistry;
  adapters: InferenceAdapters;
  eventBus: EventBus;
  defaultLanguage: string;
  exposeErrorDetails: boolean;
  features: Record<string, boolean>;
  /** Request body limit for base64 media */
  bodyLimit?: string;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(express.json({ limit: deps.bodyLimit ?? "10mb" }));

  // CORS for development
  app.use((_req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header(
      "Access-Control-Allow-Headers",
      "Origin, X-Requested-With, Content-Type, Accept, Authorization",
    );
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      connections: deps.registry.connectionCount(),
    });
  });

  app.get("/status", (_req, res) => {
    res.json({
      status: "running",
      version: SERVER_VERSION,
      connections: deps.registry.connectionCount(),
      rooms: deps.registry.roomCount(),
      adapters: {
        voice: deps.adapters.voice.status(),
        vision: deps.adapters.vision.status(),
        brain: deps.adapters.brain.status(),
      },
      features: deps.features,
      recentEvents: deps.eventBus.getRecentEvents(10).map((event) => ({
        type: event.type,
        connection_id: event.connection_id,
        t_ms: event.t_ms,
      })),
    });
  });

  app.use(
    "/api/v1",
    createApiRouter(deps.adapters, { defaultLanguage: deps.defaultLanguage }),
  );

  app.use(apiErrorHandler(deps.exposeErrorDetails));

  return app;
}
