// functions/src/index.ts

import dotenv from "dotenv";
import * as admin from "firebase-admin";
import { setGlobalOptions } from "firebase-functions/v2";
import { onDocumentCreated, onDocumentWritten } from "firebase-functions/v2/firestore";
import { onRequest } from "firebase-functions/v2/https";

import { loadConfig } from "./config";
import { createAiClientProvider } from "./core/llm/openaiClient";
import { firebaseLogger as logger } from "./core/logging/logger";
import { createStorageGifUploader, type GifUploader } from "./core/media/storageUploader";
import { createNotificationDispatcher } from "./core/notifications/dispatcher";
import {
  parseConversationDoc,
  parseMessageDoc,
  parsePresenceDoc,
} from "./core/persistence/contracts";
import { createFirestoreChatStore } from "./core/persistence/firestoreChatStore";
import { createGifHandler } from "./entry/gifHandler";
import { createHealthHandler } from "./entry/healthHandler";
import { createLanguageTutorHandler } from "./entry/languageTutorHandler";
import { createMessageContextHandler } from "./entry/messageContextHandler";
import { createTestNotificationHandler } from "./entry/notificationHandler";
import { createResearchHandler } from "./entry/researchHandler";
import { createResponseSuggestionsHandler } from "./entry/responseSuggestionsHandler";
import { createTranslateHandler } from "./entry/translateHandler";
import {
  handleConversationCreated,
  handleMessageCreated,
  handlePresenceUpdated,
} from "./entry/triggers";
import { createTutorGreetingHandler, createTutorResponseHandler } from "./entry/tutorHandlers";

// ---- Environment (.env in the functions folder) ----
dotenv.config();

const config = loadConfig();

setGlobalOptions({ maxInstances: config.maxInstances });

if (!admin.apps.length) {
  admin.initializeApp();
}

const store = createFirestoreChatStore(admin.firestore());
const ai = createAiClientProvider(config, logger);

const notifier = createNotificationDispatcher({
  store,
  push: admin.messaging(),
  logger,
  previewLength: config.notifications.previewLength,
});

// bucket() needs the default bucket from the runtime config, so resolve it per call
const uploader = (): GifUploader => createStorageGifUploader(admin.storage().bucket());

const aiDeps = { config, logger, ai };

// ------------------------------------------------------------
// HTTP endpoints
// ------------------------------------------------------------
export const translateText = onRequest(createTranslateHandler(aiDeps));
export const messageContext = onRequest(createMessageContextHandler(aiDeps));
export const languageTutor = onRequest(createLanguageTutorHandler(aiDeps));
export const generateResponseSuggestions = onRequest(createResponseSuggestionsHandler(aiDeps));

export const generateGif = onRequest(
  { timeoutSeconds: 300, memory: "1GiB" },
  createGifHandler({ ...aiDeps, fetch, uploader })
);
export const conductResearch = onRequest(
  { timeoutSeconds: 120 },
  createResearchHandler({ ...aiDeps, fetch })
);

export const generateTutorGreeting = onRequest(createTutorGreetingHandler({ ...aiDeps, store }));
export const generateTutorResponse = onRequest(createTutorResponseHandler({ ...aiDeps, store }));

export const testNotification = onRequest(
  createTestNotificationHandler({ config, logger, store, push: admin.messaging() })
);
export const healthCheck = onRequest(createHealthHandler());

// ------------------------------------------------------------
// Firestore triggers
// ------------------------------------------------------------
export const onMessageCreated = onDocumentCreated(
  "conversations/{conversationId}/messages/{messageId}",
  async (event) => {
    const snap = event.data;
    if (!snap) return;

    const message = parseMessageDoc(event.params.messageId, event.params.conversationId, snap.data());
    await handleMessageCreated({ store, notifier, logger }, message);
  }
);

export const onConversationCreated = onDocumentCreated("conversations/{conversationId}", (event) => {
  const snap = event.data;
  if (!snap) return;

  handleConversationCreated(logger, parseConversationDoc(event.params.conversationId, snap.data()));
});

export const onPresenceUpdated = onDocumentWritten("presence/{userId}", (event) => {
  const change = event.data;
  if (!change) return;

  handlePresenceUpdated(
    logger,
    event.params.userId,
    parsePresenceDoc(change.before.data()),
    parsePresenceDoc(change.after.data())
  );
});
