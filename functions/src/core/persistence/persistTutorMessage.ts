// functions/src/core/persistence/persistTutorMessage.ts

import type { LoggerLike } from "../logging/logger";
import { truncatePreview } from "../text/preview";
import type { ChatStore } from "./chatStore";

export type TutorMessageInput = {
  conversationId: string;
  tutorId: string;
  content: string;
};

/**
 * Writes a tutor-authored message (already read/delivered for the tutor)
 * and moves the conversation preview to it. Resolves to the message id.
 */
export async function persistTutorMessage(
  deps: { store: ChatStore; logger: LoggerLike; previewLength: number },
  input: TutorMessageInput
): Promise<string> {
  const { store, logger, previewLength } = deps;

  const messageId = await store.addMessage({
    conversationId: input.conversationId,
    senderId: input.tutorId,
    content: input.content,
    readBy: [input.tutorId],
    deliveredTo: [input.tutorId],
  });

  await store.updateConversationSummary(
    input.conversationId,
    truncatePreview(input.content, previewLength)
  );

  logger.info("tutor_message_persisted", {
    conversationId: input.conversationId,
    messageId,
    length: input.content.length,
  });

  return messageId;
}
