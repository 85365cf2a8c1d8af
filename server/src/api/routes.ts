/**
 * One-shot inference endpoints under /api/v1
 *
 * Independent of any WebSocket session: each request carries its own
 * base64 payload and gets a JSON (or audio/wav) response.
 */

import {
  Router,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import { z, ZodError } from "zod";
import type { InferenceAdapters } from "../providers/InferenceAdapters.js";
import { formatIssues } from "../schemas/envelopes.js";
import { ProtocolError } from "../schemas/errors.js";
import { decodeBase64Payload } from "../utils/base64.js";

const SttRequest = z.object({
  audio: z.string().min(1),
  language: z.string().min(2).max(8).optional(),
});

const TtsRequest = z.object({
  text: z.string().min(1).max(4096),
  speaker: z.string().optional(),
  language: z.string().min(2).max(8).optional(),
  emotion: z.enum(["neutral", "urgent", "calm"]).optional(),
});

const ImageRequest = z.object({
  image: z.string().min(1),
});

const RecognizeRequest = ImageRequest.extend({
  bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]).optional(),
});

const RegisterFaceRequest = ImageRequest.extend({
  user_id: z.string().min(1),
});

const CommandRequest = z.object({
  text: z.string().trim().min(1),
  user_id: z.string().min(1).optional(),
  context: z.record(z.unknown()).optional(),
});

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export interface ApiRouterOptions {
  defaultLanguage: string;
}

export function createApiRouter(
  adapters: InferenceAdapters,
  options: ApiRouterOptions,
): Router {
  const router = Router();
  const { voice, vision, brain } = adapters;

  // ── Voice ─────────────────────────────────────────────────────────────

  router.post(
    "/voice/stt",
    asyncRoute(async (req, res) => {
      const body = SttRequest.parse(req.body);
      const audio = decodeBase64Payload(body.audio, "audio");
      const result = await voice.transcribe(
        audio,
        body.language ?? options.defaultLanguage,
      );
      res.json(result);
    }),
  );

  router.post(
    "/voice/tts",
    asyncRoute(async (req, res) => {
      const body = TtsRequest.parse(req.body);
      const audio = await voice.synthesize(body.text, {
        speaker: body.speaker,
        language: body.language,
        emotion: body.emotion,
      });
      if (!audio) {
        res.status(503).json({ error: "Speech synthesis unavailable" });
        return;
      }
      res.type("audio/wav").send(audio);
    }),
  );

  router.get("/voice/status", (_req, res) => {
    res.json(voice.status());
  });

  // ── Vision ────────────────────────────────────────────────────────────

  router.post(
    "/vision/detect-faces",
    asyncRoute(async (req, res) => {
      const body = ImageRequest.parse(req.body);
      const faces = await vision.detectFaces(decodeBase64Payload(body.image, "image"));
      res.json({ faces, count: faces.length });
    }),
  );

  router.post(
    "/vision/recognize-face",
    asyncRoute(async (req, res) => {
      const body = RecognizeRequest.parse(req.body);
      const result = await vision.recognizeFace(
        decodeBase64Payload(body.image, "image"),
        body.bbox,
      );
      res.json(result);
    }),
  );

  router.post(
    "/vision/detect-emotion",
    asyncRoute(async (req, res) => {
      const body = ImageRequest.parse(req.body);
      res.json(await vision.detectEmotion(decodeBase64Payload(body.image, "image")));
    }),
  );

  router.post(
    "/vision/register-face",
    asyncRoute(async (req, res) => {
      const body = RegisterFaceRequest.parse(req.body);
      const success = await vision.registerFace(
        body.user_id,
        decodeBase64Payload(body.image, "image"),
      );
      res.status(success ? 201 : 422).json({ success, user_id: body.user_id });
    }),
  );

  router.get("/vision/status", (_req, res) => {
    res.json(vision.status());
  });

  // ── Brain ─────────────────────────────────────────────────────────────

  router.post(
    "/brain/command",
    asyncRoute(async (req, res) => {
      const body = CommandRequest.parse(req.body);
      const result = await brain.processCommand(
        body.text,
        body.user_id ?? "anonymous",
        body.context,
      );
      res.json(result);
    }),
  );

  router.get("/brain/status", (_req, res) => {
    res.json(brain.status());
  });

  return router;
}

/**
 * 4xx status carried by errors from express and body-parser, e.g. 413 for an
 * oversized body
 */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) {
    return null;
  }
  const status =
    "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

/**
 * Terminal error middleware: 4xx for client mistakes, 500 otherwise
 */
export function apiErrorHandler(exposeDetails: boolean) {
  return (
    error: unknown,
    _req: Request,
    res: Response,
    _next: NextFunction,
  ): void => {
    if (error instanceof ZodError) {
      res.status(400).json({ error: "Invalid request", details: formatIssues(error) });
      return;
    }
    if (error instanceof ProtocolError) {
      res.status(400).json({ error: error.message, details: error.details });
      return;
    }
    if (error instanceof SyntaxError) {
      // express.json() rejects a malformed body this way
      res.status(400).json({ error: "Invalid JSON body" });
      return;
    }
    const status = clientErrorStatus(error);
    if (status !== null) {
      const message = error instanceof Error ? error.message : "Bad request";
      res.status(status).json({ error: message });
      return;
    }

    console.error("[API] Request failed:", error);
    const message = error instanceof Error ? error.message : String(error);
    res.status(500).json({
      error: "Internal server error",
      ...(exposeDetails ? { details: message } : {}),
    });
  };
}
