// functions/src/core/persistence/firestoreChatStore.ts

import { FieldValue, type Firestore } from "firebase-admin/firestore";

import type { ChatStore } from "./chatStore";
import { parseConversationDoc, parseUserDoc } from "./contracts";

export function createFirestoreChatStore(db: Firestore): ChatStore {
  const users = () => db.collection("users");
  const conversations = () => db.collection("conversations");

  return {
    async getUser(userId) {
      const snap = await users().doc(userId).get();
      return snap.exists ? parseUserDoc(snap.id, snap.data()) : null;
    },

    async getConversation(conversationId) {
      const snap = await conversations().doc(conversationId).get();
      return snap.exists ? parseConversationDoc(snap.id, snap.data()) : null;
    },

    async addMessage(message) {
      const ref = conversations().doc(message.conversationId).collection("messages").doc();
      await ref.set({
        id: ref.id,
        ...message,
        timestamp: FieldValue.serverTimestamp(),
      });
      return ref.id;
    },

    async updateConversationSummary(conversationId, lastMessage) {
      await conversations().doc(conversationId).update({
        lastMessage,
        lastMessageTimestamp: FieldValue.serverTimestamp(),
        updatedAt: FieldValue.serverTimestamp(),
      });
    },
  };
}
