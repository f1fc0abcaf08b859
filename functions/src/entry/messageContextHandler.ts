// functions/src/entry/messageContextHandler.ts

import { ok, type Result } from "../core/result";
import { readHistory, type HistoryEntry } from "../core/text/history";
import type { JsonRecord } from "../core/utils/values";
import { optionalList, requireText } from "../core/validation/requireFields";
import { buildCulturalContextPrompt } from "../prompt";
import { createAiHandler, replyJson, type AiHandlerDeps } from "./aiHandler";
import type { HttpError, HttpHandler } from "./http";

const TEMPERATURE = 0.7;

type MessageContextInput = {
  selectedMessage: string;
  history: HistoryEntry[];
};

function readInput(body: JsonRecord): Result<MessageContextInput, HttpError> {
  const fields = requireText(body, ["selected_message"]);
  if (!fields.ok) return fields;

  return ok({
    selectedMessage: fields.value.selected_message,
    history: readHistory(optionalList(body, "conversation_history")),
  });
}

/** POST { selected_message, conversation_history? } -> { context } */
export function createMessageContextHandler(deps: AiHandlerDeps): HttpHandler {
  const historyWindow = deps.config.history.maxMessages;

  return createAiHandler(deps, {
    name: "message_context",
    validate: readInput,
    run: async (input, { llm }) => {
      const prompt = buildCulturalContextPrompt({
        selectedMessage: input.selectedMessage,
        history: input.history,
        historyWindow,
      });

      const context = await llm.complete({ ...prompt, temperature: TEMPERATURE, label: "message_context" });
      return replyJson({ context });
    },
  });
}
