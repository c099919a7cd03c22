import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import express from "express";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { UpstreamRequestError } from "../errors.js";
import { createSpeechApp, type SpeechApp } from "../speechApp.js";
import { parseWavHeader, WAV_HEADER_BYTES } from "../tts/wav.js";
import { FakeEncoder, FakeTextClient } from "./__mocks__/fakeBackends.js";

type Harness = {
  app: SpeechApp;
  server: http.Server;
  baseUrl: string;
};

let harness: Harness | undefined;

async function start(
  backends: { textClient: FakeTextClient; encoder: FakeEncoder },
  env: NodeJS.ProcessEnv = {}
): Promise<Harness> {
  const app = createSpeechApp({
    env: {
      ORPHEUS_AUDIT_LOG_PATH: path.join(os.tmpdir(), `tts-audit-test-${process.pid}.jsonl`),
      ...env
    },
    backends
  });
  const expressApp = express();
  expressApp.use(app.router);
  const server = http.createServer(expressApp);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server did not bind a TCP port");
  harness = { app, server, baseUrl: `http://127.0.0.1:${address.port}` };
  return harness;
}

function readAuditEvents(filePath: string): unknown[] {
  return fs
    .readFileSync(filePath, "utf8")
    .split("\n")
    .filter(Boolean)
    .map((line): unknown => JSON.parse(line));
}

function postJson(baseUrl: string, route: string, body: unknown, headers: Record<string, string> = {}) {
  return fetch(`${baseUrl}${route}`, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body)
  });
}

describe("speech HTTP routes", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    const current = harness;
    harness = undefined;
    if (current) {
      current.server.closeAllConnections();
      await new Promise<void>((resolve) => current.server.close(() => resolve()));
      current.app.shutdown();
    }
    vi.restoreAllMocks();
  });

  it("lists voices and emotion tags", async () => {
    const { baseUrl } = await start({ textClient: new FakeTextClient(), encoder: new FakeEncoder() });

    const voices = await fetch(`${baseUrl}/voices`);
    await expect(voices.json()).resolves.toEqual({
      english: ["tara", "leah", "jess", "leo", "dan", "mia", "zac", "zoe"]
    });

    const emotions = await fetch(`${baseUrl}/emotions`);
    const tags: unknown = await emotions.json();
    expect(Array.isArray(tags) && tags[0]).toBe("<laugh>");
    expect(Array.isArray(tags) && tags.length).toBe(8);
  });

  it("returns a complete WAV attachment from POST /tts", async () => {
    const textClient = new FakeTextClient({ completeText: "Hello world" });
    const { baseUrl } = await start({ textClient, encoder: new FakeEncoder({ samplesPerCall: 500 }) });

    const res = await postJson(baseUrl, "/tts", { text: "Hello world", voice: "zoe" });
    const wav = Buffer.from(await res.arrayBuffer());

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("audio/wav");
    expect(res.headers.get("content-disposition")).toMatch(/^attachment; filename="tts_output_\d+\.wav"$/);
    expect(res.headers.get("x-tts-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    expect(wav.length).toBe(WAV_HEADER_BYTES + 1000);
    expect(parseWavHeader(wav)).toMatchObject({ dataSize: 1000, channels: 1, bitsPerSample: 16, sampleRate: 24_000 });
    expect(textClient.prompts).toEqual(["zoe: Hello world"]);
  });

  it("streams the header and PCM chunks from POST /tts/stream", async () => {
    const textClient = new FakeTextClient({ fragments: ["Hel", "lo w", "orld"], finalContent: "!" });
    const { baseUrl } = await start({ textClient, encoder: new FakeEncoder({ samplesPerCall: 100 }) });

    const res = await postJson(baseUrl, "/tts/stream", { text: "Hello world", voice: "zoe" });
    const body = Buffer.from(await res.arrayBuffer());

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("audio/wav");
    expect(body.length).toBe(WAV_HEADER_BYTES + 3 * 100 * 2);
    expect(parseWavHeader(body).dataSize).toBe(0);
  });

  it("rejects a request without text before calling any backend", async () => {
    const textClient = new FakeTextClient();
    const { baseUrl } = await start({ textClient, encoder: new FakeEncoder() });

    for (const route of ["/tts", "/tts/stream"]) {
      const res = await postJson(baseUrl, route, { voice: "tara" });
      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toMatchObject({
        error: "Missing required parameter: 'text'",
        code: "invalid_request"
      });
    }
    expect(textClient.completeCalls + textClient.streamCalls).toBe(0);
  });

  it("rejects a malformed JSON body", async () => {
    const { baseUrl } = await start({ textClient: new FakeTextClient(), encoder: new FakeEncoder() });

    const res = await fetch(`${baseUrl}/tts`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json"
    });

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toMatchObject({ code: "invalid_request" });
  });

  it("answers 503 on both synthesis routes when the codec is unavailable", async () => {
    const textClient = new FakeTextClient({ completeText: "Hello", fragments: ["Hello"] });
    const { baseUrl } = await start({
      textClient,
      encoder: new FakeEncoder({ probeError: new Error("connection refused") })
    });

    for (const route of ["/tts", "/tts/stream"]) {
      const res = await postJson(baseUrl, route, { text: "Hello" });
      expect(res.status).toBe(503);
      await expect(res.json()).resolves.toMatchObject({ code: "upstream_unavailable" });
    }
    expect(textClient.completeCalls + textClient.streamCalls).toBe(0);
  });

  it("answers 502 when text generation fails", async () => {
    const textClient = new FakeTextClient({
      error: new UpstreamRequestError("Ollama request failed (500): boom", 500, "boom")
    });
    const { baseUrl } = await start({ textClient, encoder: new FakeEncoder() });

    const res = await postJson(baseUrl, "/tts", { text: "Hello" });

    expect(res.status).toBe(502);
    await expect(res.json()).resolves.toMatchObject({
      error: "Ollama request failed (500): boom",
      code: "upstream_request_failed"
    });
  });

  it("ends a stream abnormally when encoding fails mid-way", async () => {
    const textClient = new FakeTextClient({ fragments: ["Hello", "world"] });
    const { baseUrl } = await start({ textClient, encoder: new FakeEncoder({ failOnCall: 2 }) });

    const res = await postJson(baseUrl, "/tts/stream", { text: "Hello world" });

    expect(res.status).toBe(200);
    await expect(res.arrayBuffer()).rejects.toThrow();
  });

  it("stops synthesis and audits an abort when the client disconnects mid-stream", async () => {
    const auditPath = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "tts-audit-")), "audit.jsonl");
    const textClient = new FakeTextClient({ fragments: ["Hello", "world", "again", "more"] });
    const encoder = new FakeEncoder({ samplesPerCall: 100, delayMs: 200 });
    const { baseUrl } = await start({ textClient, encoder }, { ORPHEUS_AUDIT_LOG_PATH: auditPath });

    const client = new AbortController();
    const res = await fetch(`${baseUrl}/tts/stream`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ text: "Hello world" }),
      signal: client.signal
    });
    const requestId = res.headers.get("x-tts-request-id");
    if (!res.body) throw new Error("stream response has no body");
    const reader = res.body.getReader();
    let received = 0;
    while (received <= WAV_HEADER_BYTES) {
      const { done, value } = await reader.read();
      if (done) break;
      received += value.length;
    }
    client.abort();

    await vi.waitFor(
      () => {
        expect(readAuditEvents(auditPath)).toContainEqual(
          expect.objectContaining({ type: "tts_abort", requestId, mode: "stream", flushes: 2 })
        );
      },
      { timeout: 3000, interval: 50 }
    );
    expect(received).toBe(WAV_HEADER_BYTES + 200);
    expect(textClient.streamClosed).toBe(true);
    expect(encoder.inputs).toEqual(["Hello", "world"]);
    expect(readAuditEvents(auditPath)).not.toContainEqual(expect.objectContaining({ type: "tts_done" }));
  });

  it("requires the app token when one is configured", async () => {
    const { baseUrl } = await start(
      { textClient: new FakeTextClient({ completeText: "Hi there" }), encoder: new FakeEncoder() },
      { ORPHEUS_APP_TOKEN: "test-secret" }
    );

    const denied = await postJson(baseUrl, "/tts", { text: "Hi" });
    expect(denied.status).toBe(401);
    await expect(denied.json()).resolves.toMatchObject({ code: "unauthorized" });

    const allowed = await postJson(baseUrl, "/tts", { text: "Hi" }, { "X-App-Token": "test-secret" });
    expect(allowed.status).toBe(200);
    await allowed.arrayBuffer();
  });

  it("answers CORS preflight requests", async () => {
    const { baseUrl } = await start({ textClient: new FakeTextClient(), encoder: new FakeEncoder() });

    const res = await fetch(`${baseUrl}/tts`, { method: "OPTIONS" });

    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  describe("GET /health", () => {
    it("reports healthy when the text backend answers", async () => {
      const { baseUrl } = await start({ textClient: new FakeTextClient(), encoder: new FakeEncoder() });

      const res = await fetch(`${baseUrl}/health`);

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({
        status: "healthy",
        ollama_status: "connected",
        message: "Successfully connected to Ollama",
        codec_status: "ready"
      });
    });

    it("reports unhealthy with the probe error and codec failure", async () => {
      const { baseUrl } = await start({
        textClient: new FakeTextClient({ connection: { status: "error", message: "Failed to connect: fetch failed" } }),
        encoder: new FakeEncoder({ probeError: new Error("no GPU") })
      });

      const res = await fetch(`${baseUrl}/health`);

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({
        status: "unhealthy",
        ollama_status: "error",
        message: "Failed to connect: fetch failed",
        codec_status: "unavailable",
        codec_error: "no GPU"
      });
    });

    it("answers 500 when the probe itself throws", async () => {
      const { baseUrl } = await start({
        textClient: new FakeTextClient({ connection: new Error("probe exploded") }),
        encoder: new FakeEncoder()
      });

      const res = await fetch(`${baseUrl}/health`);

      expect(res.status).toBe(500);
      await expect(res.json()).resolves.toEqual({ status: "unhealthy", error: "probe exploded" });
    });
  });
});
