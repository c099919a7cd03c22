import { errorMessage } from "../errors.js";
import type { TextGenerationClient } from "./ollamaClient.js";

export type HealthOutcome = "healthy" | "unhealthy" | "error";

export type HealthReport =
  | { outcome: Exclude<HealthOutcome, "error">; ollamaStatus: "connected" | "error"; message: string }
  | { outcome: "error"; error: string };

/**
 * Reachability of the text generation backend. Never touches the codec and
 * never throws.
 */
export async function checkTextBackend(client: TextGenerationClient): Promise<HealthReport> {
  try {
    const result = await client.testConnection();
    return {
      outcome: result.status === "connected" ? "healthy" : "unhealthy",
      ollamaStatus: result.status,
      message: result.message
    };
  } catch (err) {
    return { outcome: "error", error: errorMessage(err) };
  }
}
