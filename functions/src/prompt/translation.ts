// functions/src/prompt/translation.ts

import type { PromptPair } from "./types";

export const TRANSLATION_SYSTEM_PROMPT_V1 = `
You are a professional translator. Translate the user's text into the requested target language.
Rules:
- Keep the original meaning, tone and nuance.
- Use natural, conversational phrasing in the target language.
- Do not add explanations.
- Adapt slang, emojis and idioms so they sound natural.
- Return ONLY valid JSON with the keys "translated_text" and "detected_language" (ISO 639-1 code).
`.trim();

export const TRANSLATION_SYSTEM_PROMPT = TRANSLATION_SYSTEM_PROMPT_V1;
export const TRANSLATION_PROMPT_VERSION = "TRANSLATION_V1";

export type TranslationPromptInput = {
  text: string;
  targetLanguage: string;
  sourceLanguage?: string;
};

export function buildTranslationPrompt(input: TranslationPromptInput): PromptPair {
  const source = input.sourceLanguage ? ` (source: ${input.sourceLanguage})` : "";
  return {
    system: TRANSLATION_SYSTEM_PROMPT,
    user: `Target language: ${input.targetLanguage}${source}\n\nText to translate:\n${input.text}`,
  };
}
