// functions/src/entry/languageTutorHandler.ts

import { ok, type Result } from "../core/result";
import { readHistory, type HistoryEntry } from "../core/text/history";
import type { JsonRecord } from "../core/utils/values";
import { optionalList, optionalText, requireText } from "../core/validation/requireFields";
import { buildLanguageTutorPrompt, buildTutorTranslationPrompt } from "../prompt";
import { createAiHandler, replyJson, type AiHandlerDeps } from "./aiHandler";
import type { HttpError, HttpHandler } from "./http";

const REPLY_TEMPERATURE = 0.8;
const TRANSLATION_TEMPERATURE = 0.2;

type LanguageTutorInput = {
  userMessage: string;
  history: HistoryEntry[];
  learningLanguage: string;
  primaryLanguage: string;
};

function readInput(body: JsonRecord): Result<LanguageTutorInput, HttpError> {
  const fields = requireText(body, ["user_message"]);
  if (!fields.ok) return fields;

  return ok({
    userMessage: fields.value.user_message,
    history: readHistory(optionalList(body, "conversation_history")),
    learningLanguage: optionalText(body, "learning_language", "es"),
    primaryLanguage: optionalText(body, "primary_language", "en"),
  });
}

/**
 * POST { user_message, conversation_history?, learning_language?, primary_language? }
 *   -> { message, translation }
 * Two model calls: the tutor reply, then its translation into the
 * student's primary language.
 */
export function createLanguageTutorHandler(deps: AiHandlerDeps): HttpHandler {
  const historyWindow = deps.config.history.maxMessages;

  return createAiHandler(deps, {
    name: "language_tutor",
    validate: readInput,
    run: async (input, { llm }) => {
      const message = await llm.complete({
        ...buildLanguageTutorPrompt({ ...input, historyWindow }),
        temperature: REPLY_TEMPERATURE,
        label: "language_tutor",
      });

      const translation = await llm.complete({
        ...buildTutorTranslationPrompt({
          tutorMessage: message,
          learningLanguage: input.learningLanguage,
          primaryLanguage: input.primaryLanguage,
        }),
        temperature: TRANSLATION_TEMPERATURE,
        label: "language_tutor_translation",
      });

      return replyJson({ message, translation });
    },
  });
}
