import { describe, expect, it } from "vitest";

import type { HttpHandler } from "./http";
import type { AiHandlerDeps } from "./aiHandler";
import { FakeImageClient, FakeLlm, FakeResponse, RecordingLogger, testConfig } from "../testing/fakes";
import { createLanguageTutorHandler } from "./languageTutorHandler";
import { createMessageContextHandler } from "./messageContextHandler";
import { createResponseSuggestionsHandler } from "./responseSuggestionsHandler";

function deps(llm: FakeLlm): AiHandlerDeps {
  return {
    config: testConfig(),
    logger: new RecordingLogger(),
    ai: () => ({ llm, images: new FakeImageClient() }),
  };
}

async function post(handler: HttpHandler, body: unknown) {
  const res = new FakeResponse();
  await handler({ method: "POST", body }, res);
  return res;
}

const history = [
  { sender_name: "Alice", content: "Coffee later?", is_from_current_user: false },
  { sender_name: "Me", content: "Maybe!", is_from_current_user: true },
];

describe("messageContext", () => {
  it("requires the selected message", async () => {
    const res = await post(createMessageContextHandler(deps(new FakeLlm([]))), { selected_message: "   " });

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: "'selected_message' is required and cannot be empty" });
  });

  it("returns the model's analysis", async () => {
    const llm = new FakeLlm(["A casual invitation."]);

    const res = await post(createMessageContextHandler(deps(llm)), {
      selected_message: "Coffee later?",
      conversation_history: history,
    });

    expect(res.body).toEqual({ context: "A casual invitation." });
    expect(llm.requests[0]?.temperature).toBe(0.7);
    expect(llm.requests[0]?.user).toContain("Alice: Coffee later?\nMe: Maybe!\n");
  });
});

describe("languageTutor", () => {
  it("requires the user message", async () => {
    const res = await post(createLanguageTutorHandler(deps(new FakeLlm([]))), { conversation_history: [] });

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: "'user_message' is required and cannot be empty" });
  });

  it("replies and translates the reply, defaulting to Spanish for English speakers", async () => {
    const llm = new FakeLlm(["¡Muy bien! ¿Y tú?", "Very good! And you?"]);

    const res = await post(createLanguageTutorHandler(deps(llm)), { user_message: "Estoy bien" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ message: "¡Muy bien! ¿Y tú?", translation: "Very good! And you?" });
    expect(llm.requests.map((r) => [r.label, r.temperature])).toEqual([
      ["language_tutor", 0.8],
      ["language_tutor_translation", 0.2],
    ]);
    expect(llm.requests[1]?.system).toContain("Translate this Spanish text to English.");
    expect(llm.requests[1]?.system).toContain("¡Muy bien! ¿Y tú?");
  });
});

describe("generateResponseSuggestions", () => {
  it("requires a history", async () => {
    const handler = createResponseSuggestionsHandler(deps(new FakeLlm([])));

    for (const body of [{ user_personality: "dry humour" }, { conversation_history: [] }]) {
      const res = await post(handler, body);
      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error: "conversation_history is required" });
    }
  });

  it("reads labelled lines when the answer is not JSON", async () => {
    const llm = new FakeLlm(['Positive: "Sure, see you at 5!"\nNegative: "Sorry, I can\'t today"']);

    const res = await post(createResponseSuggestionsHandler(deps(llm)), { conversation_history: history });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      positive_response: "Sure, see you at 5!",
      negative_response: "Sorry, I can't today",
    });
  });

  it("takes the JSON answer as is", async () => {
    const llm = new FakeLlm(['{"positive_response": "Yes!", "negative_response": "No."}']);

    const res = await post(createResponseSuggestionsHandler(deps(llm)), {
      conversation_history: history,
      user_personality: "dry humour",
    });

    expect(res.body).toEqual({ positive_response: "Yes!", negative_response: "No." });
    expect(llm.requests[0]?.user).toContain("The user's personality: dry humour");
  });

  it("sends only the two suggestions when the answer carries other keys", async () => {
    const llm = new FakeLlm(['```json\n{"positive_response": "Yes!", "negative_response": "No.", "tone": "casual"}\n```']);

    const res = await post(createResponseSuggestionsHandler(deps(llm)), { conversation_history: history });

    expect(res.body).toEqual({ positive_response: "Yes!", negative_response: "No." });
  });

  it("answers 500 when neither JSON nor labels can be read", async () => {
    const res = await post(createResponseSuggestionsHandler(deps(new FakeLlm(["I have no idea."]))), {
      conversation_history: history,
    });

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: "Failed to parse AI response" });
  });
});
