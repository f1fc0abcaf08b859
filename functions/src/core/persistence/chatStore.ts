// functions/src/core/persistence/chatStore.ts

import type { ConversationDoc, UserDoc } from "./contracts";

export type NewMessage = {
  conversationId: string;
  senderId: string;
  content: string;
  readBy: string[];
  deliveredTo: string[];
};

/**
 * Storage seen by handlers and triggers. Production: Firestore
 * (firestoreChatStore.ts). Timestamps are set by the store.
 */
export interface ChatStore {
  getUser(userId: string): Promise<UserDoc | null>;
  getConversation(conversationId: string): Promise<ConversationDoc | null>;
  /** Creates conversations/{conversationId}/messages/{id}; resolves to the new id. */
  addMessage(message: NewMessage): Promise<string>;
  /** Sets lastMessage plus lastMessageTimestamp/updatedAt. */
  updateConversationSummary(conversationId: string, lastMessage: string): Promise<void>;
}
