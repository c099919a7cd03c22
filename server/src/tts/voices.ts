export const AVAILABLE_VOICES = ["tara", "leah", "jess", "leo", "dan", "mia", "zac", "zoe"] as const;

export type Voice = (typeof AVAILABLE_VOICES)[number];

export const DEFAULT_VOICE: Voice = "tara";

const EMOTIONS = ["laugh", "chuckle", "sigh", "cough", "sniffle", "groan", "yawn", "gasp"] as const;

// Inline tags the model understands, e.g. "that was close <sigh>".
export const EMOTION_TAGS: readonly string[] = EMOTIONS.map((emotion) => `<${emotion}>`);

export function isVoice(value: string): value is Voice {
  return AVAILABLE_VOICES.some((voice) => voice === value);
}

export function resolveVoice(requested: string | undefined): Voice {
  if (requested === undefined) return DEFAULT_VOICE;
  if (isVoice(requested)) return requested;
  console.warn(`[tts] voice '${requested}' not in available voices, using '${DEFAULT_VOICE}'`);
  return DEFAULT_VOICE;
}

export function formatPrompt(text: string, voice?: string): string {
  return `${resolveVoice(voice)}: ${text}`;
}
