// functions/src/core/text/history.ts
// Conversation history as sent by the app (snake_case JSON).

import { asBoolean, asString, isRecord } from "../utils/values";

export type HistoryRole = "user" | "assistant";

export type HistoryEntry = {
  senderId: string;
  senderName: string;
  content: string;
  isFromCurrentUser: boolean;
  role: HistoryRole;
};

function readRole(v: unknown): HistoryRole {
  return v === "assistant" ? "assistant" : "user";
}

/** Non-object entries are dropped; missing names become "Unknown". */
export function readHistory(list: readonly unknown[]): HistoryEntry[] {
  return list.filter(isRecord).map((m) => ({
    senderId: asString(m.sender_id),
    senderName: asString(m.sender_name) || "Unknown",
    content: asString(m.content),
    isFromCurrentUser: asBoolean(m.is_from_current_user),
    role: readRole(m.role),
  }));
}

export function lastEntries<T>(items: readonly T[], max: number): T[] {
  return max > 0 ? items.slice(-max) : [];
}
