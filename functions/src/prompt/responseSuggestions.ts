// functions/src/prompt/responseSuggestions.ts

import { lastEntries, type HistoryEntry } from "../core/text/history";
import { DEFAULT_HISTORY_WINDOW, type PromptPair } from "./types";

export const RESPONSE_SUGGESTIONS_SYSTEM_PROMPT_V1 = `
You suggest replies for a messaging conversation.
Write TWO different reply options based on the conversation history.

In the history:
- Messages labelled "You" come from the USER asking for suggestions
- All other messages come from OTHER PARTICIPANTS
- You write replies FOR the user ("You")

The two options:
1. POSITIVE: agreeable, enthusiastic, accepting the proposal or question
2. NEGATIVE: a polite decline, an alternative, or a gentle no

Both replies should:
- Match the user's personality if one is given
- Be natural, conversational and 1-3 sentences long
- Respond to what the other participants said
- If nobody else has written yet, be a sensible next message from the user

Return ONLY a valid JSON object of exactly this shape:
{
  "positive_response": "your positive reply",
  "negative_response": "your negative reply"
}
`.trim();

export const RESPONSE_SUGGESTIONS_SYSTEM_PROMPT = RESPONSE_SUGGESTIONS_SYSTEM_PROMPT_V1;
export const RESPONSE_SUGGESTIONS_PROMPT_VERSION = "RESPONSE_SUGGESTIONS_V1";

export type ResponseSuggestionsPromptInput = {
  history: readonly HistoryEntry[];
  userPersonality?: string;
  historyWindow?: number;
};

export function buildResponseSuggestionsPrompt(input: ResponseSuggestionsPromptInput): PromptPair {
  const transcript = lastEntries(input.history, input.historyWindow ?? DEFAULT_HISTORY_WINDOW)
    .map((m) => `${m.isFromCurrentUser ? "You" : m.senderName}: ${m.content}`)
    .join("\n");

  const personality = input.userPersonality
    ? `\n\nThe user's personality: ${input.userPersonality}`
    : "";

  return {
    system: RESPONSE_SUGGESTIONS_SYSTEM_PROMPT,
    user: `Conversation history:\n${transcript}\n${personality}\n\nWrite two reply options (positive and negative) the user could send next.`,
  };
}
