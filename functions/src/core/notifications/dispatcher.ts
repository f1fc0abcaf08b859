// functions/src/core/notifications/dispatcher.ts

import type { Message, TokenMessage } from "firebase-admin/messaging";

import type { LoggerLike } from "../logging/logger";
import type { ChatStore } from "../persistence/chatStore";
import { truncatePreview } from "../text/preview";

/** Satisfied by firebase-admin's Messaging. */
export interface PushSender {
  send(message: Message): Promise<string>;
}

export type NotifyInput = {
  recipientId: string;
  senderName: string;
  content: string;
  conversationId: string;
  messageId: string;
  isGroup: boolean;
};

export type NotificationDispatcher = {
  /** true when the provider accepted the message; never throws */
  notify(input: NotifyInput): Promise<boolean>;
};

export type NotificationDeps = {
  store: Pick<ChatStore, "getUser">;
  push: PushSender;
  logger: LoggerLike;
  previewLength: number;
};

export function buildPushMessage(token: string, input: NotifyInput, previewLength: number): TokenMessage {
  const body = truncatePreview(input.content, previewLength);

  return {
    token,
    notification: { title: input.senderName, body },
    data: {
      conversationId: input.conversationId,
      messageId: input.messageId,
      senderName: input.senderName,
      isGroup: input.isGroup ? "true" : "false",
      type: "new_message",
    },
    apns: {
      payload: {
        aps: {
          alert: { title: input.senderName, body },
          badge: 1,
          sound: "default",
          contentAvailable: true,
        },
      },
    },
  };
}

export function createNotificationDispatcher(deps: NotificationDeps): NotificationDispatcher {
  const { store, push, logger, previewLength } = deps;

  return {
    async notify(input) {
      try {
        const recipient = await store.getUser(input.recipientId);
        if (!recipient) {
          logger.warn("notification_recipient_missing", { recipientId: input.recipientId });
          return false;
        }

        if (!recipient.fcmToken) {
          logger.info("notification_no_token", { recipientId: input.recipientId });
          return false;
        }

        const response = await push.send(buildPushMessage(recipient.fcmToken, input, previewLength));

        logger.info("notification_sent", {
          recipientId: input.recipientId,
          conversationId: input.conversationId,
          response,
        });
        return true;
      } catch (e) {
        logger.error("notification_send_failed", {
          recipientId: input.recipientId,
          error: String(e),
        });
        return false;
      }
    },
  };
}
