// functions/src/entry/notificationHandler.ts
// Manual push check; replies are plain text.

import type { AppConfig } from "../config";
import { NOTIFICATION_COPY_EN, VALIDATION_COPY_EN } from "../copy/messages.en";
import type { LoggerLike } from "../core/logging/logger";
import type { PushSender } from "../core/notifications/dispatcher";
import type { ChatStore } from "../core/persistence/chatStore";
import { optionalText } from "../core/validation/requireFields";
import { errorText } from "./aiHandler";
import { beginJsonRequest, type HttpHandler } from "./http";

export type TestNotificationDeps = {
  config: AppConfig;
  logger: LoggerLike;
  store: Pick<ChatStore, "getUser">;
  push: PushSender;
};

/** POST { userId, title?, body? } */
export function createTestNotificationHandler(deps: TestNotificationDeps): HttpHandler {
  const { config, logger, store, push } = deps;

  return async function testNotificationHandler(req, res) {
    const body = beginJsonRequest(req, res, config.cors);
    if (!body) return;

    const userId = optionalText(body, "userId");
    if (!userId) {
      res.status(400).send(VALIDATION_COPY_EN.userIdMissing);
      return;
    }

    try {
      const user = await store.getUser(userId);
      if (!user) {
        res.status(404).send(NOTIFICATION_COPY_EN.userNotFound);
        return;
      }
      if (!user.fcmToken) {
        res.status(404).send(NOTIFICATION_COPY_EN.noToken);
        return;
      }

      const response = await push.send({
        token: user.fcmToken,
        notification: {
          title: optionalText(body, "title", NOTIFICATION_COPY_EN.defaultTitle),
          body: optionalText(body, "body", NOTIFICATION_COPY_EN.defaultBody),
        },
      });

      logger.info("test_notification_sent", { userId, response });
      res.status(200).send(`Notification sent: ${response}`);
    } catch (e) {
      logger.error("test_notification_failed", { userId, error: String(e) });
      res.status(500).send(`Error: ${errorText(e)}`);
    }
  };
}
