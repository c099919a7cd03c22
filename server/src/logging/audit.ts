import fs from "node:fs";
import path from "node:path";

export type AuditEvent =
  | {
      type: "tts_start";
      at: string;
      requestId: string;
      mode: "complete" | "stream";
      voice: string;
      textChars: number;
    }
  | {
      type: "tts_done" | "tts_abort";
      at: string;
      requestId: string;
      mode: "complete" | "stream";
      flushes: number;
      pcmBytes: number;
      tookMs: number;
    }
  | {
      type: "tts_error";
      at: string;
      requestId: string;
      mode: "complete" | "stream";
      code: string;
      message: string;
      tookMs: number;
    }
  | {
      type: "health_check";
      at: string;
      outcome: string;
      codec: string;
    };

export type AuditLogger = {
  log(event: AuditEvent): void;
  close(): void;
};

export function createAuditLogger(filePath: string): AuditLogger {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  const stream = fs.createWriteStream(filePath, { flags: "a" });
  stream.on("error", (err) => {
    console.error("[audit] write failed", { filePath, error: err.message });
  });

  return {
    log(event: AuditEvent) {
      stream.write(`${JSON.stringify(event)}\n`);
    },
    close() {
      stream.end();
    }
  };
}
