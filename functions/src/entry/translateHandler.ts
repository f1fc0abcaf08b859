// functions/src/entry/translateHandler.ts

import { VALIDATION_COPY_EN } from "../copy/messages.en";
import { extractFields } from "../core/parsing/extractFields";
import { ok, type Result } from "../core/result";
import type { JsonRecord } from "../core/utils/values";
import { optionalText, requireText } from "../core/validation/requireFields";
import { buildTranslationPrompt } from "../prompt";
import { createAiHandler, replyJson, type AiHandlerDeps } from "./aiHandler";
import type { HttpError, HttpHandler } from "./http";

const TEMPERATURE = 0.2;

type TranslateInput = {
  text: string;
  targetLanguage: string;
  sourceLanguage: string; // "" when not given
};

export function readTranslateInput(body: JsonRecord): Result<TranslateInput, HttpError> {
  const fields = requireText(body, ["text", "target_language"], VALIDATION_COPY_EN.translate);
  if (!fields.ok) return fields;

  return ok({
    text: fields.value.text,
    targetLanguage: fields.value.target_language,
    sourceLanguage: optionalText(body, "source_language"),
  });
}

/**
 * POST { text, target_language, source_language? }
 *   -> { translated_text, detected_language }
 * An unstructured model answer is used as the translation as a whole.
 */
export function createTranslateHandler(deps: AiHandlerDeps): HttpHandler {
  const { logger } = deps;

  return createAiHandler(deps, {
    name: "translate",
    validate: readTranslateInput,
    run: async (input, { llm }) => {
      const prompt = buildTranslationPrompt({
        text: input.text,
        targetLanguage: input.targetLanguage,
        sourceLanguage: input.sourceLanguage || undefined,
      });

      const raw = await llm.complete({ ...prompt, temperature: TEMPERATURE, label: "translate" });
      const fields = extractFields(raw, ["translated_text"], { optional: ["detected_language"] });

      if (!fields.ok) {
        logger.warn("translate_unstructured_reply", { reason: fields.error.reason });
        return replyJson({
          translated_text: fields.error.fallbackText,
          detected_language: input.sourceLanguage,
        });
      }

      return replyJson({
        translated_text: fields.value.translated_text,
        detected_language: fields.value.detected_language ?? input.sourceLanguage,
      });
    },
  });
}
