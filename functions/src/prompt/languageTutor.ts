// functions/src/prompt/languageTutor.ts
// Free-form practice partner (no stored tutor persona).

import { lastEntries, type HistoryEntry } from "../core/text/history";
import { languageName } from "./languages";
import { DEFAULT_HISTORY_WINDOW, type PromptPair } from "./types";

export const LANGUAGE_TUTOR_PROMPT_VERSION = "LANGUAGE_TUTOR_V1";

export function languageTutorSystemPrompt(learning: string, primary: string): string {
  return `
You are a friendly, encouraging language tutor helping someone learn ${learning}.
Your student's primary language is ${primary}.

How you teach:
1. Answer mostly in ${learning} so the student gets immersive practice
2. Add ${primary} explanations when introducing new ideas or correcting mistakes
3. Keep the conversation going with questions about the student's life and interests
4. Correct mistakes gently and explain why
5. Praise progress to build confidence
6. Prefer useful, everyday vocabulary and phrases
7. Speak naturally, not like a textbook
8. Share cultural facts when they fit

Response style:
- Open with 2-3 sentences in ${learning}
- Occasionally add short ${primary} clarifications in parentheses for hard words
- End with a follow-up question
- Match the complexity to the student's level
`.trim();
}

export type LanguageTutorPromptInput = {
  userMessage: string;
  history: readonly HistoryEntry[];
  learningLanguage: string; // ISO code
  primaryLanguage: string;  // ISO code
  historyWindow?: number;
};

export function buildLanguageTutorPrompt(input: LanguageTutorPromptInput): PromptPair {
  const learning = languageName(input.learningLanguage);
  const primary = languageName(input.primaryLanguage);

  const transcript = lastEntries(input.history, input.historyWindow ?? DEFAULT_HISTORY_WINDOW)
    .map((m) => `${m.role === "assistant" ? "Tutor" : "Student"}: ${m.content}`)
    .join("\n");

  return {
    system: languageTutorSystemPrompt(learning, primary),
    user: `Recent conversation:\n\n${transcript}\n\nStudent's latest message: ${input.userMessage}\n\nWrite your next reply. Stay in character, be helpful and engaging, and move the conversation forward with a question or prompt.`,
  };
}

export type TutorTranslationPromptInput = {
  tutorMessage: string;
  learningLanguage: string;
  primaryLanguage: string;
};

/** System-only prompt: the user turn stays empty. */
export function buildTutorTranslationPrompt(input: TutorTranslationPromptInput): PromptPair {
  const learning = languageName(input.learningLanguage);
  const primary = languageName(input.primaryLanguage);

  return {
    system: `Translate this ${learning} text to ${primary}.\nOnly translate the ${learning} parts and leave any ${primary} already in the text as it is:\n\n${input.tutorMessage}\n\nReply with the translation only, no commentary.`,
    user: "",
  };
}
