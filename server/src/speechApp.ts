import crypto from "node:crypto";
import express, { type NextFunction, type Request, type Response } from "express";
import { requireAppToken } from "./auth/appToken.js";
import { loadConfig, type SpeechConfig } from "./config.js";
import { createSpeechContext, type SpeechBackends, type SpeechContext } from "./context.js";
import { SpeechError, errorMessage } from "./errors.js";
import { createAuditLogger, type AuditLogger } from "./logging/audit.js";
import type { SynthesisPipeline } from "./tts/synthesisPipeline.js";
import { parseSynthesisRequest } from "./tts/synthesisRequest.js";
import { AVAILABLE_VOICES, EMOTION_TAGS } from "./tts/voices.js";

export type SpeechAppOptions = {
  env?: NodeJS.ProcessEnv;
  backends?: Partial<SpeechBackends>;
};

export type SpeechApp = {
  router: express.Router;
  shutdown: () => void;
  config: SpeechConfig;
  context: SpeechContext;
};

type SynthesisMode = "complete" | "stream";

const REQUEST_ID_HEADER = "X-TTS-Request-Id";

function hasHttpStatus(err: unknown): err is { status: number; message?: string } {
  return typeof err === "object" && err !== null && "status" in err && typeof err.status === "number";
}

// Resolves on "drain", or on "close" when the client went away mid-wait.
function waitForDrain(res: Response): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.on("drain", done);
    res.on("close", done);
  });
}

export function createSpeechApp(opts: SpeechAppOptions = {}): SpeechApp {
  const config = loadConfig(opts.env ?? process.env);
  const context = createSpeechContext(config, opts.backends);
  const audit: AuditLogger = createAuditLogger(config.auditLogPath);

  const router = express.Router();
  router.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", config.corsOrigin);
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, X-App-Token");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Expose-Headers", `${REQUEST_ID_HEADER}, Content-Disposition`);
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });
  router.use(express.json({ limit: "1mb" }));

  const assignRequestId = (res: Response) => {
    const requestId = crypto.randomUUID();
    res.setHeader(REQUEST_ID_HEADER, requestId);
    return requestId;
  };

  const begin = (req: Request, requestId: string, mode: SynthesisMode) => {
    requireAppToken(req, config.appToken);
    const request = parseSynthesisRequest(req.body, context.defaults());
    audit.log({
      type: "tts_start",
      at: new Date().toISOString(),
      requestId,
      mode,
      voice: request.voice,
      textChars: request.text.length
    });
    console.log("[tts] synthesize start", { requestId, mode, voice: request.voice, textChars: request.text.length });
    return request;
  };

  const finish = (
    type: "tts_done" | "tts_abort",
    requestId: string,
    mode: SynthesisMode,
    pipeline: SynthesisPipeline,
    startedAt: number
  ) => {
    const { flushes, pcmBytes } = pipeline.getStats();
    const tookMs = Date.now() - startedAt;
    audit.log({ type, at: new Date().toISOString(), requestId, mode, flushes, pcmBytes, tookMs });
    const line = type === "tts_done" ? "[tts] synthesize done" : "[tts] synthesize aborted";
    console.log(line, { requestId, mode, flushes, pcmBytes, tookMs });
  };

  const fail = (requestId: string, mode: SynthesisMode, err: unknown, startedAt: number) => {
    const tookMs = Date.now() - startedAt;
    const code = err instanceof SpeechError ? err.code : "internal_error";
    const message = errorMessage(err);
    audit.log({ type: "tts_error", at: new Date().toISOString(), requestId, mode, code, message, tookMs });
    console.warn("[tts] synthesize failed", { requestId, mode, code, error: message, tookMs });
  };

  router.get("/health", async (_req, res, next) => {
    try {
      const { text, codec } = await context.checkHealth();
      audit.log({ type: "health_check", at: new Date().toISOString(), outcome: text.outcome, codec: codec.state });
      if (text.outcome === "error") {
        res.status(500).json({ status: "unhealthy", error: text.error });
        return;
      }
      res.json({
        status: text.outcome,
        ollama_status: text.ollamaStatus,
        message: text.message,
        codec_status: codec.state,
        ...(codec.state === "unavailable" ? { codec_error: codec.reason } : {})
      });
    } catch (err) {
      next(err);
    }
  });

  router.post("/tts", async (req, res, next) => {
    const startedAt = Date.now();
    const requestId = assignRequestId(res);
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });
    try {
      const request = begin(req, requestId, "complete");
      const pipeline = await context.openPipeline(request, controller.signal);
      const wav = await pipeline.complete();
      finish("tts_done", requestId, "complete", pipeline, startedAt);
      res.setHeader("Content-Type", "audio/wav");
      res.setHeader("Cache-Control", "no-store");
      res.setHeader("Content-Disposition", `attachment; filename="tts_output_${Math.floor(Date.now() / 1000)}.wav"`);
      res.send(wav);
    } catch (err) {
      fail(requestId, "complete", err, startedAt);
      next(err);
    }
  });

  router.post("/tts/stream", async (req, res, next) => {
    const startedAt = Date.now();
    const requestId = assignRequestId(res);
    const controller = new AbortController();
    let clientGone = false;
    res.on("close", () => {
      if (res.writableEnded) return;
      clientGone = true;
      controller.abort();
    });

    let pipeline: SynthesisPipeline;
    try {
      const request = begin(req, requestId, "stream");
      pipeline = await context.openPipeline(request, controller.signal);
    } catch (err) {
      fail(requestId, "stream", err, startedAt);
      next(err);
      return;
    }

    res.status(200);
    res.setHeader("Content-Type", "audio/wav");
    res.setHeader("Cache-Control", "no-store");
    res.setHeader("X-Accel-Buffering", "no");

    try {
      // Pull one chunk at a time so a slow or vanished client stops synthesis.
      for await (const chunk of pipeline.stream()) {
        if (clientGone) break;
        if (!res.write(chunk)) await waitForDrain(res);
        if (clientGone) break;
      }
      if (clientGone) {
        finish("tts_abort", requestId, "stream", pipeline, startedAt);
        return;
      }
      res.end();
      finish("tts_done", requestId, "stream", pipeline, startedAt);
    } catch (err) {
      if (clientGone) {
        finish("tts_abort", requestId, "stream", pipeline, startedAt);
        return;
      }
      fail(requestId, "stream", err, startedAt);
      if (!res.headersSent) {
        next(err);
        return;
      }
      // Audio already went out; end the response abnormally so the client can tell.
      res.destroy();
    }
  });

  router.get("/voices", (_req, res) => {
    res.json({ english: AVAILABLE_VOICES });
  });

  router.get("/emotions", (_req, res) => {
    res.json(EMOTION_TAGS);
  });

  router.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = res.getHeader(REQUEST_ID_HEADER);
    if (res.headersSent) {
      res.destroy();
      return;
    }
    if (err instanceof SpeechError) {
      res.status(err.statusCode).json({ error: err.message, code: err.code, requestId });
      return;
    }
    if (hasHttpStatus(err) && err.status >= 400 && err.status < 500) {
      res.status(err.status).json({ error: "Invalid request body", code: "invalid_request", requestId });
      return;
    }
    console.error("[api] unhandled error", { requestId, error: errorMessage(err) });
    res.status(500).json({ error: "Internal server error", code: "internal_error", requestId });
  });

  const shutdown = () => {
    audit.close();
  };

  return { router, shutdown, config, context };
}
