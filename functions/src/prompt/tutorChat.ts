// functions/src/prompt/tutorChat.ts
// Prompts for tutor accounts (persona stored on the tutor's user doc).

import { lastEntries, type HistoryEntry } from "../core/text/history";
import { DEFAULT_HISTORY_WINDOW, type PromptPair } from "./types";

export const TUTOR_CHAT_PROMPT_VERSION = "TUTOR_CHAT_V1";

export type TutorGreetingPromptInput = {
  tutorName: string;
  tutorPersonality: string;
  userName: string;
  groupName?: string;
};

export function buildTutorGreetingPrompt(input: TutorGreetingPromptInput): PromptPair {
  const { tutorName, tutorPersonality, userName, groupName } = input;

  const groupNote = groupName
    ? `\n\nIMPORTANT: You are joining a GROUP CHAT called '${groupName}'. Say that you are joining this group, mention the group name naturally, and make clear you are here to help everyone in it.`
    : "";

  const welcomeStep = groupName
    ? "Acknowledge the group by name and say you are excited to help everyone in it"
    : "Say you are excited to help them learn";

  const audience = groupName ? "the group" : "them";

  const system = `
You are ${tutorName}, an AI language tutor with this personality:

${tutorPersonality}

Write a warm, engaging welcome message for a new student named ${userName} who just started a chat with you.${groupNote}

Your greeting should:
1. Be warm and friendly and match your personality
2. Introduce yourself in 1-2 sentences
3. ${welcomeStep}
4. End with a question that gets ${audience} talking (goals, interests, or current level)
5. Sound conversational, not formal or robotic
6. Be 3-5 sentences in total
7. Include some of the language you teach

This is the first message the student sees from you: make them excited to learn.
`.trim();

  const user = groupName
    ? `Write a welcoming first message for ${userName}. Remember, this is for the '${groupName}' group chat.`
    : `Write a welcoming first message for ${userName}.`;

  return { system, user };
}

export type TutorResponsePromptInput = {
  tutorName: string;
  tutorPersonality: string;
  history: readonly HistoryEntry[];
  historyWindow?: number;
};

export function buildTutorResponsePrompt(input: TutorResponsePromptInput): PromptPair {
  const transcript = lastEntries(input.history, input.historyWindow ?? DEFAULT_HISTORY_WINDOW)
    .map((m) => `${m.senderName}: ${m.content}`)
    .join("\n");

  const system = `
You are ${input.tutorName}, an AI language tutor with this personality:

${input.tutorPersonality}

You are chatting with a student. Your goals:
1. Teach and guide them in the language you specialise in
2. Reply naturally while keeping your personality
3. Ask follow-up questions to keep things going
4. Correct, explain and encourage where it helps
5. Match their energy: excited with excited students, supportive with struggling ones
6. Keep replies conversational (usually 2-4 sentences)
7. Mix in the target language naturally
8. Adapt to their level
`.trim();

  return {
    system,
    user: `Recent conversation:\n\n${transcript}\n\nWrite your next reply. Stay in character, be helpful and engaging, and move the conversation forward with a question or prompt.`,
  };
}
