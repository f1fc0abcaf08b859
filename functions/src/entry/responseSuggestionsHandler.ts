// functions/src/entry/responseSuggestionsHandler.ts

import { ERROR_COPY_EN, VALIDATION_COPY_EN } from "../copy/messages.en";
import { extractFields } from "../core/parsing/extractFields";
import { ok, type Result } from "../core/result";
import { readHistory, type HistoryEntry } from "../core/text/history";
import type { JsonRecord } from "../core/utils/values";
import { optionalText, requireList } from "../core/validation/requireFields";
import { buildResponseSuggestionsPrompt } from "../prompt";
import { createAiHandler, replyError, replyJson, type AiHandlerDeps } from "./aiHandler";
import type { HttpError, HttpHandler } from "./http";

const TEMPERATURE = 0.7;

const SUGGESTION_KEYS = ["positive_response", "negative_response"] as const;

type SuggestionsInput = {
  history: HistoryEntry[];
  userPersonality: string;
};

function readInput(body: JsonRecord): Result<SuggestionsInput, HttpError> {
  const history = requireList(body, "conversation_history", VALIDATION_COPY_EN.historyRequired);
  if (!history.ok) return history;

  return ok({
    history: readHistory(history.value),
    userPersonality: optionalText(body, "user_personality"),
  });
}

/**
 * POST { conversation_history, user_personality? }
 *   -> { positive_response, negative_response }
 */
export function createResponseSuggestionsHandler(deps: AiHandlerDeps): HttpHandler {
  const { config, logger } = deps;

  return createAiHandler(deps, {
    name: "response_suggestions",
    validate: readInput,
    run: async (input, { llm }) => {
      const prompt = buildResponseSuggestionsPrompt({
        history: input.history,
        userPersonality: input.userPersonality || undefined,
        historyWindow: config.history.maxMessages,
      });

      const raw = await llm.complete({ ...prompt, temperature: TEMPERATURE, label: "response_suggestions" });
      const fields = extractFields(raw, SUGGESTION_KEYS, {
        labels: { positive_response: "positive", negative_response: "negative" },
      });

      if (!fields.ok) {
        logger.error("response_suggestions_unparsable", {
          reason: fields.error.reason,
          missing: fields.error.missing,
        });
        return replyError({ status: 500, error: ERROR_COPY_EN.unparsableSuggestions });
      }

      return replyJson({
        positive_response: fields.value.positive_response,
        negative_response: fields.value.negative_response,
      });
    },
  });
}
