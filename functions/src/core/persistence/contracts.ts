// functions/src/core/persistence/contracts.ts
// Document shapes written by the app, parsed defensively (docs are not ours).

import { asBoolean, asString, asStringArray, isRecord } from "../utils/values";

export type UserDoc = {
  id: string;
  displayName: string;
  fcmToken: string | null;
  isTutor: boolean;
  personality: string | null;
};

export type ConversationDoc = {
  id: string;
  participantIds: string[];
  isGroup: boolean;
  groupName: string | null;
};

export type MessageDoc = {
  id: string;
  conversationId: string;
  senderId: string;
  content: string;
};

export type PresenceDoc = {
  status: string | null;
};

function nullableString(v: unknown): string | null {
  const s = asString(v).trim();
  return s ? s : null;
}

export function parseUserDoc(id: string, data: unknown): UserDoc {
  const d = isRecord(data) ? data : {};
  return {
    id,
    displayName: asString(d.displayName),
    fcmToken: nullableString(d.fcmToken),
    isTutor: asBoolean(d.isTutor),
    personality: nullableString(d.personality),
  };
}

export function parseConversationDoc(id: string, data: unknown): ConversationDoc {
  const d = isRecord(data) ? data : {};
  return {
    id,
    participantIds: asStringArray(d.participantIds),
    isGroup: asBoolean(d.isGroup),
    groupName: nullableString(d.groupName),
  };
}

export function parseMessageDoc(id: string, conversationId: string, data: unknown): MessageDoc {
  const d = isRecord(data) ? data : {};
  return {
    id,
    conversationId,
    senderId: asString(d.senderId),
    content: asString(d.content),
  };
}

export function parsePresenceDoc(data: unknown): PresenceDoc | null {
  if (!isRecord(data)) return null;
  return { status: nullableString(data.status) };
}
