import { describe, expect, it } from "vitest";

import type { HistoryEntry } from "../core/text/history";
import {
  buildCulturalContextPrompt,
  buildLanguageTutorPrompt,
  buildResearchPrompt,
  buildResponseSuggestionsPrompt,
  buildTranslationPrompt,
  buildTutorGreetingPrompt,
  buildTutorResponsePrompt,
  buildTutorTranslationPrompt,
  languageName,
  RESPONSE_SUGGESTIONS_SYSTEM_PROMPT,
  TRANSLATION_SYSTEM_PROMPT,
} from "./index";

function entry(senderName: string, content: string, extra: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    senderId: senderName.toLowerCase(),
    senderName,
    content,
    isFromCurrentUser: false,
    role: "user",
    ...extra,
  };
}

describe("languageName", () => {
  it("maps known codes and passes unknown ones through", () => {
    expect(languageName("ES")).toBe("Spanish");
    expect(languageName("xx")).toBe("xx");
  });
});

describe("buildTranslationPrompt", () => {
  it("mentions the source language when given", () => {
    const out = buildTranslationPrompt({ text: "Hello", targetLanguage: "es", sourceLanguage: "en" });
    expect(out).toEqual({
      system: TRANSLATION_SYSTEM_PROMPT,
      user: "Target language: es (source: en)\n\nText to translate:\nHello",
    });
  });

  it("omits the source note otherwise", () => {
    const out = buildTranslationPrompt({ text: "Bonjour", targetLanguage: "de" });
    expect(out.user).toBe("Target language: de\n\nText to translate:\nBonjour");
  });
});

describe("buildCulturalContextPrompt", () => {
  it("adds no context block without history", () => {
    const out = buildCulturalContextPrompt({ selectedMessage: "See ya", history: [] });
    expect(out.user).toBe(
      'Please give a cultural and contextual analysis of this message:\n\n"See ya"\n\n' +
        "Explain the cultural context, tone, possible meanings, and how people from different cultural backgrounds might understand it."
    );
  });

  it("lists recent messages by sender name", () => {
    const out = buildCulturalContextPrompt({
      selectedMessage: "Break a leg!",
      history: [entry("Alice", "Big show tonight"), entry("Bob", "Break a leg!")],
    });
    expect(out.user).toContain(
      "Conversation context (recent messages):\nAlice: Big show tonight\nBob: Break a leg!\n"
    );
  });
});

describe("buildLanguageTutorPrompt", () => {
  it("labels turns as Student and Tutor and names both languages", () => {
    const out = buildLanguageTutorPrompt({
      userMessage: "¿Qué tal?",
      history: [entry("Me", "hola"), entry("Tutor", "¡Hola!", { role: "assistant" })],
      learningLanguage: "es",
      primaryLanguage: "en",
    });

    expect(out.system.startsWith("You are a friendly, encouraging language tutor helping someone learn Spanish.")).toBe(true);
    expect(out.system).toContain("Your student's primary language is English.");
    expect(out.user).toContain("Recent conversation:\n\nStudent: hola\nTutor: ¡Hola!\n\nStudent's latest message: ¿Qué tal?");
  });

  it("keeps only the configured history window", () => {
    const history = Array.from({ length: 12 }, (_, i) => entry("U", `m${i}`));
    const out = buildLanguageTutorPrompt({
      userMessage: "next",
      history,
      learningLanguage: "fr",
      primaryLanguage: "en",
      historyWindow: 2,
    });
    expect(out.user).toContain("Recent conversation:\n\nStudent: m10\nStudent: m11\n\n");
  });
});

describe("buildTutorTranslationPrompt", () => {
  it("puts everything in the system turn", () => {
    const out = buildTutorTranslationPrompt({
      tutorMessage: "¡Muy bien!",
      learningLanguage: "es",
      primaryLanguage: "en",
    });
    expect(out.user).toBe("");
    expect(out.system).toBe(
      "Translate this Spanish text to English.\nOnly translate the Spanish parts and leave any English already in the text as it is:\n\n¡Muy bien!\n\nReply with the translation only, no commentary."
    );
  });
});

describe("buildTutorGreetingPrompt", () => {
  it("adds the group note when a group name is present", () => {
    const out = buildTutorGreetingPrompt({
      tutorName: "Lena",
      tutorPersonality: "Patient and curious.",
      userName: "Sam",
      groupName: "Study Buddies",
    });
    expect(out.system).toContain("You are joining a GROUP CHAT called 'Study Buddies'.");
    expect(out.system).toContain("4. End with a question that gets the group talking");
    expect(out.user).toBe(
      "Write a welcoming first message for Sam. Remember, this is for the 'Study Buddies' group chat."
    );
  });

  it("stays one-to-one otherwise", () => {
    const out = buildTutorGreetingPrompt({
      tutorName: "Lena",
      tutorPersonality: "Patient and curious.",
      userName: "Sam",
    });
    expect(out.system).not.toContain("GROUP CHAT");
    expect(out.system).toContain("4. End with a question that gets them talking");
    expect(out.user).toBe("Write a welcoming first message for Sam.");
  });
});

describe("buildTutorResponsePrompt", () => {
  it("uses sender names in the transcript", () => {
    const out = buildTutorResponsePrompt({
      tutorName: "Lena",
      tutorPersonality: "Patient.",
      history: [entry("Lena", "Hallo!"), entry("Sam", "Hi, I want to learn German")],
    });
    expect(out.system.startsWith("You are Lena, an AI language tutor with this personality:\n\nPatient.")).toBe(true);
    expect(out.user).toContain("Recent conversation:\n\nLena: Hallo!\nSam: Hi, I want to learn German\n\n");
  });
});

describe("buildResponseSuggestionsPrompt", () => {
  it("labels the requesting user as You and appends the personality", () => {
    const out = buildResponseSuggestionsPrompt({
      history: [entry("Me", "Hi", { isFromCurrentUser: true }), entry("Alice", "Coffee?")],
      userPersonality: "casual",
    });
    expect(out).toEqual({
      system: RESPONSE_SUGGESTIONS_SYSTEM_PROMPT,
      user:
        "Conversation history:\nYou: Hi\nAlice: Coffee?\n\n\nThe user's personality: casual\n\n" +
        "Write two reply options (positive and negative) the user could send next.",
    });
  });
});

describe("buildResearchPrompt", () => {
  it("formats each source block", () => {
    const out = buildResearchPrompt("What is a tide?", [
      { title: "Tides", url: "https://example.com/tides", content: "Tides are caused by the moon." },
    ]);
    expect(out.user).toBe(
      "Research question: What is a tide?\n\nSearch results:\n\n" +
        "Source: Tides\nURL: https://example.com/tides\nContent: Tides are caused by the moon.\n\n" +
        "Write a thorough summary that answers the research question from these sources."
    );
  });
});
