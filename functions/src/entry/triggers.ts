// functions/src/entry/triggers.ts
// Firestore trigger bodies. index.ts parses the snapshots and calls these.

import type { LoggerLike } from "../core/logging/logger";
import type { NotificationDispatcher } from "../core/notifications/dispatcher";
import type { ChatStore } from "../core/persistence/chatStore";
import type { ConversationDoc, MessageDoc, PresenceDoc } from "../core/persistence/contracts";

export type MessageTriggerDeps = {
  store: Pick<ChatStore, "getUser" | "getConversation">;
  notifier: NotificationDispatcher;
  logger: LoggerLike;
};

const UNKNOWN_SENDER = "Someone";

/**
 * Notifies every participant except the sender, one after another.
 * Resolves to the number of notifications the provider accepted; never throws.
 */
export async function handleMessageCreated(deps: MessageTriggerDeps, message: MessageDoc): Promise<number> {
  const { store, notifier, logger } = deps;

  try {
    const conversation = await store.getConversation(message.conversationId);
    if (!conversation) {
      logger.warn("message_conversation_missing", {
        conversationId: message.conversationId,
        messageId: message.id,
      });
      return 0;
    }

    const recipients = conversation.participantIds.filter((id) => id !== message.senderId);
    const sender = await store.getUser(message.senderId);
    const senderName = sender?.displayName || UNKNOWN_SENDER;

    let delivered = 0;
    for (const recipientId of recipients) {
      const sent = await notifier.notify({
        recipientId,
        senderName,
        content: message.content,
        conversationId: conversation.id,
        messageId: message.id,
        isGroup: conversation.isGroup,
      });
      if (sent) delivered++;
    }

    logger.info("message_notifications_done", {
      conversationId: conversation.id,
      messageId: message.id,
      recipients: recipients.length,
      delivered,
    });
    return delivered;
  } catch (e) {
    logger.error("on_message_created_failed", {
      conversationId: message.conversationId,
      messageId: message.id,
      error: String(e),
    });
    return 0;
  }
}

export function handleConversationCreated(logger: LoggerLike, conversation: ConversationDoc): void {
  logger.info("conversation_created", {
    conversationId: conversation.id,
    participants: conversation.participantIds.length,
    isGroup: conversation.isGroup,
  });
}

/** Logs a status change; true when one happened. */
export function handlePresenceUpdated(
  logger: LoggerLike,
  userId: string,
  before: PresenceDoc | null,
  after: PresenceDoc | null
): boolean {
  if (!before || !after || before.status === after.status) return false;

  logger.info("presence_changed", { userId, from: before.status, to: after.status });
  return true;
}
