import http from "node:http";
import express from "express";
import { createSpeechApp } from "./speechApp.js";

const rawLog = console.log.bind(console);
const rawWarn = console.warn.bind(console);
const rawError = console.error.bind(console);

const stamp = () => `[${new Date().toISOString()} pid=${process.pid}]`;

// Prefix all server logs with timestamp + pid.
console.log = (...args: unknown[]) => rawLog(stamp(), ...args);
console.warn = (...args: unknown[]) => rawWarn(stamp(), ...args);
console.error = (...args: unknown[]) => rawError(stamp(), ...args);

function describeReason(reason: unknown) {
  if (reason instanceof Error) return { message: reason.message, stack: reason.stack };
  return String(reason);
}

function logExit(event: string, detail?: unknown) {
  const payload = {
    ts: new Date().toISOString(),
    event,
    pid: process.pid,
    uptimeSec: Math.round(process.uptime()),
    detail
  };
  console.error("[server-exit]", JSON.stringify(payload));
}

process.on("uncaughtException", (err) => {
  logExit("uncaughtException", describeReason(err));
});

process.on("unhandledRejection", (reason: unknown) => {
  logExit("unhandledRejection", { reason: describeReason(reason) });
});

const app = express();
app.disable("x-powered-by");

const { router, shutdown, config, context } = createSpeechApp();
app.use(router);

// Probe the codec before taking traffic; an unavailable codec is logged and
// every synthesis request then fails fast with 503.
await context.ensureReady();

const server = http.createServer(app);

let shuttingDown = false;
const handleSignal = (signal: "SIGTERM" | "SIGINT") => {
  if (shuttingDown) return;
  shuttingDown = true;
  logExit(signal);
  shutdown();
  server.close(() => process.exit(0));
  // Streaming responses can hold the server open; force-exit.
  setTimeout(() => process.exit(0), 1500).unref();
};
process.on("SIGTERM", () => handleSignal("SIGTERM"));
process.on("SIGINT", () => handleSignal("SIGINT"));
process.on("exit", (code) => logExit("exit", { code }));

server.listen(config.port, config.host, () => {
  console.log("orpheus-speech-server listening", {
    pid: process.pid,
    host: config.host,
    port: config.port
  });
});
