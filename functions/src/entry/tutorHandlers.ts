// functions/src/entry/tutorHandlers.ts
// AI tutors posting into a conversation: first greeting and follow-up replies.

import { VALIDATION_COPY_EN } from "../copy/messages.en";
import type { ChatStore } from "../core/persistence/chatStore";
import { persistTutorMessage } from "../core/persistence/persistTutorMessage";
import { ok, type Result } from "../core/result";
import { readHistory, type HistoryEntry } from "../core/text/history";
import type { JsonRecord } from "../core/utils/values";
import { optionalText, requireList, requireText } from "../core/validation/requireFields";
import { buildTutorGreetingPrompt, buildTutorResponsePrompt } from "../prompt";
import { createAiHandler, replyJson, type AiHandlerDeps } from "./aiHandler";
import type { HttpError, HttpHandler } from "./http";

const GREETING_TEMPERATURE = 0.9;
const RESPONSE_TEMPERATURE = 0.85;

export type TutorHandlerDeps = AiHandlerDeps & {
  store: ChatStore;
};

type TutorFields = {
  tutorId: string;
  tutorName: string;
  tutorPersonality: string;
  conversationId: string;
};

type GreetingInput = TutorFields & {
  userName: string;
  groupName: string; // "" outside group chats
};

type ResponseInput = TutorFields & {
  history: HistoryEntry[];
};

function readTutorFields(body: JsonRecord): Result<TutorFields, HttpError> {
  const fields = requireText(
    body,
    ["tutor_id", "tutor_personality", "tutor_name", "conversation_id"],
    VALIDATION_COPY_EN.tutorFields
  );
  if (!fields.ok) return fields;

  return ok({
    tutorId: fields.value.tutor_id,
    tutorName: fields.value.tutor_name,
    tutorPersonality: fields.value.tutor_personality,
    conversationId: fields.value.conversation_id,
  });
}

export function readGreetingInput(body: JsonRecord): Result<GreetingInput, HttpError> {
  const tutor = readTutorFields(body);
  if (!tutor.ok) return tutor;

  return ok({
    ...tutor.value,
    userName: optionalText(body, "user_name", "Unknown"),
    groupName: optionalText(body, "group_name"),
  });
}

export function readResponseInput(body: JsonRecord): Result<ResponseInput, HttpError> {
  const tutor = readTutorFields(body);
  if (!tutor.ok) return tutor;

  const history = requireList(body, "conversation_history", VALIDATION_COPY_EN.historyNotEmpty);
  if (!history.ok) return history;

  return ok({ ...tutor.value, history: readHistory(history.value) });
}

/**
 * POST { tutor_id, tutor_personality, tutor_name, conversation_id,
 *        user_name?, group_name? } -> { greeting, message_id }
 */
export function createTutorGreetingHandler(deps: TutorHandlerDeps): HttpHandler {
  const { config, logger, store } = deps;
  const persist = { store, logger, previewLength: config.notifications.previewLength };

  return createAiHandler(deps, {
    name: "tutor_greeting",
    validate: readGreetingInput,
    run: async (input, { llm }) => {
      const greeting = await llm.complete({
        ...buildTutorGreetingPrompt({
          tutorName: input.tutorName,
          tutorPersonality: input.tutorPersonality,
          userName: input.userName,
          groupName: input.groupName || undefined,
        }),
        temperature: GREETING_TEMPERATURE,
        label: "tutor_greeting",
      });

      const messageId = await persistTutorMessage(persist, {
        conversationId: input.conversationId,
        tutorId: input.tutorId,
        content: greeting,
      });

      logger.info("tutor_greeting_created", { conversationId: input.conversationId, messageId });
      return replyJson({ greeting, message_id: messageId });
    },
  });
}

/**
 * POST { tutor_id, tutor_personality, tutor_name, conversation_id,
 *        conversation_history } -> { response, message_id }
 */
export function createTutorResponseHandler(deps: TutorHandlerDeps): HttpHandler {
  const { config, logger, store } = deps;
  const persist = { store, logger, previewLength: config.notifications.previewLength };

  return createAiHandler(deps, {
    name: "tutor_response",
    validate: readResponseInput,
    run: async (input, { llm }) => {
      const response = await llm.complete({
        ...buildTutorResponsePrompt({
          tutorName: input.tutorName,
          tutorPersonality: input.tutorPersonality,
          history: input.history,
          historyWindow: config.history.maxMessages,
        }),
        temperature: RESPONSE_TEMPERATURE,
        label: "tutor_response",
      });

      const messageId = await persistTutorMessage(persist, {
        conversationId: input.conversationId,
        tutorId: input.tutorId,
        content: response,
      });

      logger.info("tutor_response_created", { conversationId: input.conversationId, messageId });
      return replyJson({ response, message_id: messageId });
    },
  });
}
