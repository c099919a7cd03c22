import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { GenerationParams } from "./ollamaClient.js";
import type { SynthesisRequest } from "./synthesisPipeline.js";
import { resolveVoice } from "./voices.js";

export type SynthesisDefaults = GenerationParams & {
  maxTextChars: number;
};

const SynthesizeBodySchema = z.object({
  text: z.string(),
  voice: z.string().trim().optional(),
  temperature: z.number().min(0).optional(),
  top_p: z.number().min(0).max(1).optional(),
  repeat_penalty: z.number().min(0).optional(),
  repetition_penalty: z.number().min(0).optional()
});

export const MISSING_TEXT_MESSAGE = "Missing required parameter: 'text'";

export function parseSynthesisRequest(body: unknown, defaults: SynthesisDefaults): SynthesisRequest {
  if (typeof body !== "object" || body === null || !("text" in body)) {
    throw new ValidationError(MISSING_TEXT_MESSAGE);
  }
  const parsed = SynthesizeBodySchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "body";
    throw new ValidationError(`Invalid parameter '${where}': ${issue?.message ?? "invalid value"}`);
  }

  const data = parsed.data;
  if (!data.text.trim()) {
    throw new ValidationError(MISSING_TEXT_MESSAGE);
  }
  if (data.text.length > defaults.maxTextChars) {
    throw new ValidationError(`Parameter 'text' exceeds ${defaults.maxTextChars} characters`);
  }

  return Object.freeze({
    text: data.text,
    voice: resolveVoice(data.voice || undefined),
    params: Object.freeze({
      temperature: data.temperature ?? defaults.temperature,
      topP: data.top_p ?? defaults.topP,
      repeatPenalty: data.repeat_penalty ?? data.repetition_penalty ?? defaults.repeatPenalty
    })
  });
}
