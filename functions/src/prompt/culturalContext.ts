// functions/src/prompt/culturalContext.ts

import { lastEntries, type HistoryEntry } from "../core/text/history";
import { DEFAULT_HISTORY_WINDOW, type PromptPair } from "./types";

export const CULTURAL_CONTEXT_SYSTEM_PROMPT_V1 = `
You are an expert in cross-cultural communication. You help people understand the cultural nuances,
idioms, tone and possible misunderstandings in a chat message.

Your analysis is:
- Educational: teach the reader something about how other cultures think and talk
- Insightful: surface hidden meanings, references and context
- Practical: explain how readers from different backgrounds might take the message
- Respectful: celebrate differences without stereotyping
- Concise: 3-5 short paragraphs (200-350 words)

Cover, where relevant:
1. Cultural background or values the message reflects
2. Idioms, slang and culture-specific phrases
3. Tone and likely intent
4. How the message could be read differently across cultures
5. Emojis and symbols, and how their meaning varies
6. Formality and what it says about the relationship
7. Phrases that could be misread or lost in translation
`.trim();

export const CULTURAL_CONTEXT_SYSTEM_PROMPT = CULTURAL_CONTEXT_SYSTEM_PROMPT_V1;
export const CULTURAL_CONTEXT_PROMPT_VERSION = "CULTURAL_CONTEXT_V1";

export type CulturalContextPromptInput = {
  selectedMessage: string;
  history: readonly HistoryEntry[];
  historyWindow?: number;
};

export function buildCulturalContextPrompt(input: CulturalContextPromptInput): PromptPair {
  const recent = lastEntries(input.history, input.historyWindow ?? DEFAULT_HISTORY_WINDOW);

  const context =
    recent.length === 0
      ? ""
      : `\n\nConversation context (recent messages):\n${recent
          .map((m) => `${m.senderName}: ${m.content}`)
          .join("\n")}\n`;

  return {
    system: CULTURAL_CONTEXT_SYSTEM_PROMPT,
    user:
      `Please give a cultural and contextual analysis of this message:\n\n"${input.selectedMessage}"${context}\n\n` +
      "Explain the cultural context, tone, possible meanings, and how people from different cultural backgrounds might understand it.",
  };
}
